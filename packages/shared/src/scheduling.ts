export const DEFAULT_CHECK_INTERVAL_SECONDS = 300;
export const DEFAULT_PRODUCT_DELAY_SECONDS = 2;
export const DEFAULT_ERROR_BACKOFF_SECONDS = 60;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Waits for `ms` milliseconds. Resolves early (never rejects) once `signal`
 * aborts, so callers check `signal.aborted` afterwards.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

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

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}
