/**
 * Sleep for a duration, rejecting with the signal's reason if it aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(signal?.reason);
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Resolves or rejects with `promise`, unless `signal` aborts first, in which
 * case it rejects with the signal's reason. The underlying work is not stopped;
 * the caller just stops waiting on it.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    // Settling again after an abort is a no-op, so a late rejection is absorbed here.
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * A child controller that aborts with `reason` after `timeoutMs`, or with the
 * parent's reason when the parent aborts. Call `dispose()` once done so the
 * timer does not keep the process alive.
 */
export function createTimeoutController(
  parent: AbortSignal,
  timeoutMs: number,
  reason: () => unknown
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onParentAbort = () => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => controller.abort(reason()), timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent.removeEventListener('abort', onParentAbort);
    },
  };
}
