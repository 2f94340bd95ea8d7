// src/combinators.ts
// Toy versions of the four Promise combinators. Each one fans out over the
// input units and fans back in under its own completion policy:
//   all        -> wait for every fulfillment, fail fast on the first rejection
//   allSettled -> wait for every unit, never reject
//   race       -> copy whichever unit settles first
//   any        -> first fulfillment wins, reject only when every unit rejected
//
// Input is iterated inside the executor so a bad iterable rejects the result
// instead of throwing synchronously, matching the native statics.

export type CombinatorName = "all" | "allSettled" | "race" | "any";

/** Message the native Promise.any uses for its AggregateError. */
export const ANY_REJECTED_MESSAGE = "All promises were rejected";

/**
 * @param values units to wait on; plain values count as already fulfilled
 * @returns fulfills with every value in input order, or rejects with the
 *          reason of the first unit (by time) to reject
 */
export function all<T>(values: Iterable<T | PromiseLike<T>>): Promise<Awaited<T>[]> {
  return new Promise<Awaited<T>[]>((resolve, reject) => {
    const items = Array.from(values);
    const results: Awaited<T>[] = new Array<Awaited<T>>(items.length);
    let remaining = items.length;
    if (remaining === 0) { resolve(results); return; }
    items.forEach((item, index) => {
      Promise.resolve(item).then((value) => {
        results[index] = value;
        remaining -= 1;
        if (remaining === 0) resolve(results);
      }, reject);
    });
  });
}

/**
 * @param values units to wait on
 * @returns fulfills once every unit settled, with one outcome record per unit
 *          in input order; never rejects
 */
export function allSettled<T>(values: Iterable<T | PromiseLike<T>>): Promise<PromiseSettledResult<Awaited<T>>[]> {
  return new Promise<PromiseSettledResult<Awaited<T>>[]>((resolve, reject) => {
    const outcomes = Array.from(values, (item) => Promise.resolve(item).then(
      (value): PromiseSettledResult<Awaited<T>> => ({ status: "fulfilled", value }),
      (reason: unknown): PromiseSettledResult<Awaited<T>> => ({ status: "rejected", reason }),
    ));
    all(outcomes).then(resolve, reject);
  });
}

/**
 * @param values units to race; with no units the result never settles
 * @returns settles the same way as the first unit to settle
 */
export function race<T>(values: Iterable<T | PromiseLike<T>>): Promise<Awaited<T>> {
  return new Promise<Awaited<T>>((resolve, reject) => {
    for (const item of values) {
      Promise.resolve(item).then(resolve, reject);
    }
  });
}

/**
 * @param values units to wait on
 * @returns fulfills with the first unit to fulfill; rejects with an
 *          AggregateError holding every reason in input order once all units
 *          rejected (immediately, with no reasons, for empty input)
 */
export function any<T>(values: Iterable<T | PromiseLike<T>>): Promise<Awaited<T>> {
  return new Promise<Awaited<T>>((resolve, reject) => {
    const items = Array.from(values);
    const errors: unknown[] = new Array<unknown>(items.length);
    let remaining = items.length;
    if (remaining === 0) { reject(new AggregateError(errors, ANY_REJECTED_MESSAGE)); return; }
    items.forEach((item, index) => {
      Promise.resolve(item).then(resolve, (reason: unknown) => {
        errors[index] = reason;
        remaining -= 1;
        if (remaining === 0) reject(new AggregateError(errors, ANY_REJECTED_MESSAGE));
      });
    });
  });
}

export interface CombinatorPolicy {
  name: CombinatorName;
  waitsFor: string;
  fulfillsWith: string;
  rejectsWith: string;
  emptyInput: string;
}

export const COMBINATOR_POLICIES: readonly CombinatorPolicy[] = [
  {
    name: "all",
    waitsFor: "every unit to fulfill, or the first rejection",
    fulfillsWith: "array of values in input order",
    rejectsWith: "reason of the first unit to reject",
    emptyInput: "fulfills with []",
  },
  {
    name: "allSettled",
    waitsFor: "every unit to settle",
    fulfillsWith: "array of {status, value | reason} in input order",
    rejectsWith: "never rejects",
    emptyInput: "fulfills with []",
  },
  {
    name: "race",
    waitsFor: "the first unit to settle",
    fulfillsWith: "value of the first unit, if it fulfilled",
    rejectsWith: "reason of the first unit, if it rejected",
    emptyInput: "stays pending forever",
  },
  {
    name: "any",
    waitsFor: "the first fulfillment, or every rejection",
    fulfillsWith: "value of the first unit to fulfill",
    rejectsWith: "AggregateError with every reason in input order",
    emptyInput: "rejects with AggregateError([])",
  },
];
