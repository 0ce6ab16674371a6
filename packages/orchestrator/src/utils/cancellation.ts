/**
 * Cancellation helpers built on AbortSignal
 *
 * Every wait inside a job goes through raceWithSignal so that an abort is
 * observed at the next suspension point even when the awaited operation
 * ignores the signal itself.
 */

import { toCancelledError } from "../errors.js";

/**
 * Throw a CancelledError if the signal has already fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw toCancelledError(signal.reason);
  }
}

/**
 * Settle with `promise`, or reject with CancelledError as soon as `signal` aborts
 *
 * The losing promise keeps running; its eventual rejection is absorbed here
 * so it never surfaces as an unhandled rejection.
 */
export function raceWithSignal<T>(promise: PromiseLike<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return Promise.resolve(promise);
  }
  if (signal.aborted) {
    Promise.resolve(promise).then(noop, noop);
    return Promise.reject(toCancelledError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(toCancelledError(signal.reason));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function noop(): void {}
