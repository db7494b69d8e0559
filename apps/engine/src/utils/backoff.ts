// Exponential backoff: with the defaults 500ms → 1s → 2s → 4s (capped at maxInterval).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits multiplier x that, etc.
export function calculateBackOff(
  attempt: number,
  initialIntervalMs: number = 500,
  backoffMultiplier: number = 2.0,
  maxInterval: number = 30000
): number {
  let delay = initialIntervalMs * Math.pow(backoffMultiplier, attempt - 1);
  delay = Math.min(delay, maxInterval);
  // ±10% jitter so retries of parallel dialogs don't hit the provider in lockstep
  const jitter = delay * 0.1;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  return Math.floor(delay + randomJitter);
}
