export interface BackoffPolicy {
    initialIntervalMs: number;
    multiplier: number;
    maxIntervalMs: number;
    jitter: number;  // fraction of the delay, 0.1 = ±10%
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
    initialIntervalMs: 2000,
    multiplier: 2,
    maxIntervalMs: 30000,
    jitter: 0.1,
};

// Exponential backoff: 2s → 4s → 8s … (capped at maxIntervalMs).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs.
export function calculateBackOff(
  attempt: number,
  initialIntervalMs: number = DEFAULT_BACKOFF.initialIntervalMs,
  backoffMultiplier: number = DEFAULT_BACKOFF.multiplier,
  maxInterval: number = DEFAULT_BACKOFF.maxIntervalMs,
  jitterRatio: number = DEFAULT_BACKOFF.jitter,
): number {
  let delay = initialIntervalMs * Math.pow(backoffMultiplier, attempt - 1);
  delay = Math.min(delay, maxInterval);
  const jitter = delay * jitterRatio;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  return Math.max(0, Math.floor(delay + randomJitter));
}
