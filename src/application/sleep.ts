/** Node timers fire immediately for delays above this. */
const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Waits `ms`, resolving early (never rejecting) when `signal` aborts so
 * shutdown latency is bounded by the sleep granularity of the caller.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(ms, MAX_TIMER_MS));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
