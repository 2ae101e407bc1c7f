/**
 * Cancellation and scheduling helpers shared by the pipeline stages.
 *
 * Every long-running operation accepts an optional AbortSignal. Stages call
 * checkCancelled() between units of work, and waits go through sleep() so
 * they end as soon as the signal fires.
 */

/**
 * Thrown when work stops because its AbortSignal fired.
 * Carries the signal's reason (e.g. a WorkflowTimeoutError).
 */
export class OperationCancelledError extends Error {
  public readonly reason: unknown;

  constructor(reason?: unknown) {
    super(reason instanceof Error ? `Cancelled: ${reason.message}` : 'Operation cancelled');
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'OperationCancelledError';
    this.reason = reason;
  }
}

/**
 * Throw OperationCancelledError if the signal has fired.
 */
export function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(signal.reason);
  }
}

/**
 * Wait for `ms` milliseconds, rejecting early if the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against a signal. The underlying work is not stopped,
 * only the wait for it. Use with providers that cannot be interrupted.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new OperationCancelledError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Yield to the event loop so timers and I/O callbacks can run
 * between CPU-bound batches.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
