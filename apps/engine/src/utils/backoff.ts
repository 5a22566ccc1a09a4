export interface RetryPolicy {
  maxRetries: number;
  initialIntervalMs: number;
  backoffMultiplier: number;
  maxIntervalMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 0,
  initialIntervalMs: 1000,
  backoffMultiplier: 4.0,
  maxIntervalMs: 60000,
};

// Exponential backoff: base-4 gives 1s → 4s → 16s → 64s (capped at maxIntervalMs).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits 4x that, etc.
export function calculateBackOff(attempt: number, policy: Partial<RetryPolicy> = {}): number {
  const { initialIntervalMs, backoffMultiplier, maxIntervalMs } = { ...DEFAULT_RETRY_POLICY, ...policy };
  let delay = initialIntervalMs * Math.pow(backoffMultiplier, attempt - 1);
  delay = Math.min(delay, maxIntervalMs);
  // ±10% jitter so retried modules across runs don't land together
  const jitter = delay * 0.1;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  return Math.floor(delay + randomJitter);
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise(resolve => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
