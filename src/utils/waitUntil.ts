import { CancelledError, WaitTimeoutError, throwIfCancelled } from '../errors';

export type WaitCheck = (signal?: AbortSignal) => Promise<boolean>;

/**
 * Poll `check` every `intervalMs` until it reports done.
 *
 * Errors from `check` are returned as-is; only the waiting is retried.
 * Rejects with {@link WaitTimeoutError} once the deadline has passed and with
 * {@link CancelledError} when `signal` aborts, including while sleeping.
 */
export async function waitUntil(
  timeoutMs: number,
  intervalMs: number,
  check: WaitCheck,
  signal?: AbortSignal
): Promise<void> {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    throwIfCancelled(signal);

    if (Date.now() > deadline) {
      throw new WaitTimeoutError(timeoutMs);
    }

    if (await check(signal)) {
      return;
    }

    await sleep(intervalMs, signal);
  }
}

/**
 * Sleep that ends early with a CancelledError when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
