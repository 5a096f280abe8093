/**
 * @fileoverview Async Utilities
 *
 * Abortable waiting primitives for the background supervisor.
 *
 * @packageDocumentation
 */

/**
 * Sleep for `ms`, waking early when `signal` aborts.
 *
 * Resolves `true` when the full interval elapsed and `false` when the sleep
 * was cut short. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Resolve when `signal` aborts. Already-aborted signals resolve immediately.
 */
export function abortedPromise(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  settled(): boolean;
}

/**
 * A promise whose resolver is held outside its executor.
 */
export function createDeferred<T = void>(): Deferred<T> {
  let settled = false;
  let resolveFn: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    resolveFn = resolve;
  });
  return {
    promise,
    resolve(value: T) {
      if (settled) return;
      settled = true;
      resolveFn(value);
    },
    settled: () => settled,
  };
}
