/**
 * Retry delay policy.
 *
 * Attempt 1 always waits the base delay. With backoff enabled, attempt n waits
 * base * multiplier^(n-1), capped at maxDelayMs. Jitter is added on top.
 */

export interface BackoffPolicy {
  baseDelayMs:    number;
  backoffEnabled: boolean;
  multiplier:     number;
  maxDelayMs:     number;
  jitterMs:       number;
  /** Attempts per bad streak when backoff is enabled */
  maxAttempts:    number;
}

export function computeBaseDelay(attempt: number, policy: BackoffPolicy): number {
  if (!policy.backoffEnabled || attempt <= 1) return policy.baseDelayMs;
  const scaled = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(scaled, policy.maxDelayMs);
}

export function computeRetryDelay(
  attempt: number,
  policy:  BackoffPolicy,
  random:  () => number = Math.random,
): number {
  const jitter = policy.jitterMs > 0 ? random() * policy.jitterMs : 0;
  return Math.round(computeBaseDelay(attempt, policy) + jitter);
}

/** Whether an escalated attempt should schedule another one. */
export function shouldRearm(attempt: number, policy: BackoffPolicy): boolean {
  return policy.backoffEnabled && attempt < policy.maxAttempts;
}
