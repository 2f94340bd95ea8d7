// src/deferred.ts
// A promise whose settle functions live outside the executor, so demos and
// tests can decide exactly when (and in what order) units settle.

/**
 * Externally settleable promise.
 *
 * AF: promise is the unit; resolve/reject settle it from outside.
 * RI: once done is true, neither resolve nor reject has any effect.
 */
export class Deferred<T> {
  public readonly promise: Promise<T>;
  private res!: (value: T | PromiseLike<T>) => void;
  private rej!: (reason?: unknown) => void;
  private done = false;

  public constructor() {
    this.promise = new Promise<T>((res, rej) => { this.res = res; this.rej = rej; });
  }

  /** Fulfill (or adopt `value` if it is a thenable). No-op after the first settle. */
  public readonly resolve = (value: T | PromiseLike<T>): void => {
    if (this.done) return;
    this.done = true;
    this.res(value);
  };

  /** Reject with `reason`. No-op after the first settle. */
  public readonly reject = (reason?: unknown): void => {
    if (this.done) return;
    this.done = true;
    this.rej(reason);
  };

  /** @returns whether resolve or reject has been called */
  public get settled(): boolean { return this.done; }
}
