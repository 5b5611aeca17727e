import { MigrationCancelledError } from './errors';

/**
 * Waits `ms` milliseconds. Rejects with MigrationCancelledError as soon as
 * the signal aborts, including when it is already aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new MigrationCancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new MigrationCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new MigrationCancelledError();
  }
}
