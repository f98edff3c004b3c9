/**
 * Races a promise against an AbortSignal.
 * Rejects with `onAbort()` if given, otherwise with signal.reason.
 *
 * The raced promise keeps running; its eventual rejection is observed here so
 * it never surfaces as unhandled.
 */
export const withAbort = <T>(
  promise: Promise<T>,
  signal: AbortSignal,
  onAbort?: () => Error
): Promise<T> => {
  const reason = (): unknown => (onAbort ? onAbort() : signal.reason);

  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(reason());
  }

  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(reason());
    signal.addEventListener("abort", abort, { once: true });
    promise
      .then(resolve)
      .catch(reject)
      .finally(() => {
        signal.removeEventListener("abort", abort);
      });
  });
};

/**
 * Races a promise against a timer, rejecting with the error built by
 * `onTimeout` once `ms` elapse.
 */
export const withTimeout = <T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> =>
  withAbort(promise, AbortSignal.timeout(ms), onTimeout);
