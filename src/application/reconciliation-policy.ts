export interface BackoffPolicy {
  pollIntervalMs: number;
  backoffFactor: number;
  maxBackoffMs: number;
}

/**
 * Delay before the next poll once `attempts` polls have been made.
 * A factor of 1 gives a fixed interval.
 */
export function computeNextCheckDelayMs(attempts: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, attempts - 1);
  const delay = policy.pollIntervalMs * policy.backoffFactor ** exponent;
  return Math.min(policy.maxBackoffMs, Math.round(delay));
}
