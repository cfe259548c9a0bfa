/**
 * Waits before retry `attempt + 1`: 2s, 4s, 8s...
 * Resolves early, and clears its timer, when `signal` aborts.
 */
export function backoff(attempt: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
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
    }, Math.pow(2, attempt) * 1000);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
