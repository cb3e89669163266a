/**
 * Resolve after `ms` milliseconds, or early when `signal` aborts.
 *
 * Never rejects: callers check `signal.aborted` afterwards, so an abort that
 * lands on the same tick as the timer still counts as a cancellation.
 */
export function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted || ms <= 0) {
    return Promise.resolve();
  }

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type Settled<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown }
  | { status: 'aborted' };

/**
 * Settle `promise` unless `signal` aborts first.
 *
 * The underlying promise keeps running after an abort; its eventual result is
 * dropped.
 */
export function settleUnlessAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<Settled<T>> {
  const settled = promise.then(
    (value): Settled<T> => ({ status: 'fulfilled', value }),
    (reason: unknown): Settled<T> => ({ status: 'rejected', reason })
  );

  if (!signal) {
    return settled;
  }
  if (signal.aborted) {
    return Promise.resolve({ status: 'aborted' });
  }

  return new Promise(resolve => {
    const onAbort = () => resolve({ status: 'aborted' });
    signal.addEventListener('abort', onAbort, { once: true });
    void settled.then(result => {
      signal.removeEventListener('abort', onAbort);
      resolve(result);
    });
  });
}
