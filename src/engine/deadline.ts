import { MotorpoolError, StorageError } from '../core/errors';

export type DeadlineOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

/**
 * Runs one storage call under a deadline and the caller's signal. The task receives a signal
 * that aborts on either, and the returned promise settles as soon as one fires, so a stuck
 * driver never leaves the caller pending. Anything the task throws that is not already a typed
 * error becomes `StorageError('unavailable')`.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) {
    return Promise.reject(cancelled(signal.reason));
  }

  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new StorageError('timeout', `The inventory did not answer within ${timeoutMs} ms`);
      controller.abort(error);
      cleanup();
      reject(error);
    }, timeoutMs);

    const onAbort = () => {
      const error = cancelled(signal?.reason);
      controller.abort(error);
      cleanup();
      reject(error);
    };

    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(toStorageError(error));
      },
    );
  });
}

export function toStorageError(error: unknown): MotorpoolError {
  if (error instanceof MotorpoolError) return error;
  return new StorageError('unavailable', 'The inventory could not be queried; try again', {
    cause: error,
  });
}

function cancelled(reason: unknown): StorageError {
  return new StorageError('cancelled', 'The call was cancelled before the inventory answered', {
    cause: reason,
  });
}
