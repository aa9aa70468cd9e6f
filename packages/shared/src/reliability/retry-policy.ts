// Generation calls get exactly one retry; worst-case latency stays at two requests
// plus one fixed delay.
export const GENERATION_MAX_ATTEMPTS = 2;
export const DEFAULT_RETRY_DELAY_MS = 2_000;

export type RetryPolicy = {
  readonly maxAttempts: typeof GENERATION_MAX_ATTEMPTS;
  readonly delayMs: number;
};

export function buildRetryPolicy(delayMs: number = DEFAULT_RETRY_DELAY_MS): RetryPolicy {
  const normalizedDelay = Number.isFinite(delayMs) ? Math.max(0, Math.floor(delayMs)) : DEFAULT_RETRY_DELAY_MS;
  return {
    maxAttempts: GENERATION_MAX_ATTEMPTS,
    delayMs: normalizedDelay
  };
}
