/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { all, allSettled, any, race } from './combinators.js';

export interface Resolvers<T> {
    promise: Promise<T>;
    resolve: (value: T | PromiseLike<T>) => void;
    reject: (reason?: unknown) => void;
}

declare global {
    interface PromiseConstructor {
        withResolvers<T>(): Resolvers<T>;
    }
}

export type PromiseStatic = 'all' | 'allSettled' | 'race' | 'any' | 'withResolvers';

export const PROMISE_STATICS: readonly PromiseStatic[] = ['all', 'allSettled', 'race', 'any', 'withResolvers'];

/**
 * Promise.withResolvers(), which Node.js < 22.x does not have.
 */
export function withResolvers<T>(): Resolvers<T> {
    let resolve!: (value: T | PromiseLike<T>) => void;
    let reject!: (reason?: unknown) => void;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

const implementations: Record<PromiseStatic, unknown> = { all, allSettled, race, any, withResolvers };

/**
 * Add the toy combinators and withResolvers() to a Promise constructor.
 * @param target object to patch, normally the global Promise
 * @param force replace statics the target already has
 * @returns names actually installed, in PROMISE_STATICS order
 */
export function installPolyfills(
    target: Partial<Record<PromiseStatic, unknown>> = Promise,
    force = false,
): PromiseStatic[] {
    const installed: PromiseStatic[] = [];
    for (const name of PROMISE_STATICS) {
        if (!force && typeof target[name] === 'function') continue;
        target[name] = implementations[name];
        installed.push(name);
    }
    return installed;
}

installPolyfills();
