/**
 * Capped exponential backoff for connection establishment.
 *
 * delay(attempt) = min(maxDelayMs, baseDelayMs * 2^attempt), attempt being
 * the zero-based index of the attempt that just failed. Optional jitter adds
 * up to 10% and is capped at maxDelayMs as well.
 *
 * @module transport/retry-policy
 */

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_BASE_DELAY_MS = 300;
const DEFAULT_MAX_DELAY_MS = 7000;
const DEFAULT_MAX_ATTEMPTS = 3;
const JITTER_RATIO = 0.1;

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Total attempts including the first one. At least 1. */
  readonly maxAttempts: number;
  readonly jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  baseDelayMs: DEFAULT_BASE_DELAY_MS,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  jitter: false,
});

// ============================================================================
// Construction
// ============================================================================

function assertNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${value}`);
  }
}

export function createRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  const policy: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    ...overrides,
  };

  assertNonNegative('baseDelayMs', policy.baseDelayMs);
  assertNonNegative('maxDelayMs', policy.maxDelayMs);

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
  }

  return Object.freeze(policy);
}

// ============================================================================
// Delay
// ============================================================================

export function computeRetryDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt);
  const capped = Math.min(policy.maxDelayMs, exponential);

  if (!policy.jitter) {
    return capped;
  }

  const jitter = random() * JITTER_RATIO * capped;
  return Math.min(policy.maxDelayMs, capped + jitter);
}

/**
 * Upper bound on how long connect() can take under a policy, for callers
 * that want an overall deadline.
 */
export function maxConnectDurationMs(policy: RetryPolicy, timeoutMs: number): number {
  return policy.maxAttempts * (timeoutMs + policy.maxDelayMs);
}
