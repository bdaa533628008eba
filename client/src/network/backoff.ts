export interface BackoffPolicy {
  baseMs: number;
  factor: number;
  maxMs: number;
  /** Reconnect attempts before giving up */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseMs: 1000,
  factor: 2,
  maxMs: 30_000,
  maxAttempts: 5,
};

/** Delay before reconnect attempt `attempt` (1-based). */
export function backoffDelay(attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.baseMs * policy.factor ** exponent, policy.maxMs);
}
