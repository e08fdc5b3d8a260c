/** Backoff applied to unreachable and timed out tool calls. */
export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: 2,
  baseDelayMs: 250,
  factor: 2,
  maxDelayMs: 4_000,
});

/** Delay before retry number {@link retryIndex} (0-based), capped at `maxDelayMs`. */
export function computeBackoffDelay(policy: RetryPolicy, retryIndex: number): number {
  const raw = policy.baseDelayMs * Math.pow(policy.factor, Math.max(0, retryIndex));
  return Math.min(policy.maxDelayMs, Math.max(0, Math.round(raw)));
}

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxRetries: Math.max(0, Math.floor(overrides.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries)),
    baseDelayMs: Math.max(0, overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs),
    factor: Math.max(1, overrides.factor ?? DEFAULT_RETRY_POLICY.factor),
    maxDelayMs: Math.max(0, overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs),
  };
}
