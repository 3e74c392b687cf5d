/**
 * Timer helpers resolved through {@link globalThis} at call time. Sinon's fake
 * timers install their overrides on the global object, so going through these
 * wrappers (instead of capturing `node:timers` at import time) lets the tests
 * drive tick loops and timeouts deterministically.
 */
export type TimeoutHandle = ReturnType<typeof globalThis.setTimeout>;

/** Schedules a one-shot callback using the currently installed timer. */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  return globalThis.setTimeout(callback, Math.max(0, delayMs));
}

/** Cancels a handle returned by {@link runtimeSetTimeout}. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}

/**
 * Sleeps for `delayMs`. Resolves `true` once the delay elapsed and `false`
 * when the signal aborts first; never rejects so cancellation stays a normal
 * control-flow value.
 */
export function sleep(delayMs: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      runtimeClearTimeout(handle);
      resolve(false);
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Races `promise` against a timeout and an optional abort signal. Resolves
 * with the promise value, or with `null` when the timeout fires or the signal
 * aborts. Rejections of `promise` propagate.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | null,
  signal?: AbortSignal,
): Promise<T | null> {
  if (signal?.aborted) {
    return Promise.resolve(null);
  }
  return new Promise<T | null>((resolve, reject) => {
    let handle: TimeoutHandle | null = null;
    let settled = false;
    const finish = (value: T | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (handle !== null) {
        runtimeClearTimeout(handle);
      }
      signal?.removeEventListener("abort", onAbort);
      resolve(value);
    };
    const onAbort = (): void => finish(null);
    if (timeoutMs !== null) {
      handle = runtimeSetTimeout(() => finish(null), timeoutMs);
    }
    signal?.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => finish(value),
      (error: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        if (handle !== null) {
          runtimeClearTimeout(handle);
        }
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export const runtimeTimers = {
  setTimeout: runtimeSetTimeout,
  clearTimeout: runtimeClearTimeout,
  sleep,
  withTimeout,
} as const;
