/**
 * Backoff Calculator
 *
 * Turns a retry policy and a zero-based attempt number into a delay in
 * milliseconds.
 */

export const BACKOFF_STRATEGIES = ["exponential_backoff", "linear_backoff", "fixed_delay", "immediate_fail"] as const;

export type BackoffStrategy = (typeof BACKOFF_STRATEGIES)[number];

/**
 * Retry policy for one error kind
 */
export interface RetryPolicy {
  strategy: BackoffStrategy;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
}

export interface JitterOptions {
  /** Maximum relative deviation, e.g. 0.1 for ±10% */
  fraction: number;
  random?: () => number;
}

export function exponentialDelay(
  baseMs: number,
  maxMs: number,
  exponentialBase: number,
  attempt: number,
): number {
  return Math.min(maxMs, baseMs * Math.pow(exponentialBase, Math.max(0, attempt)));
}

export function linearDelay(baseMs: number, maxMs: number, attempt: number): number {
  return Math.min(maxMs, baseMs * Math.max(0, attempt));
}

/**
 * Perturb a delay by a uniform factor in [1 - fraction, 1 + fraction],
 * clamped to [0, maxMs].
 */
export function applyJitter(
  valueMs: number,
  fraction: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  if (valueMs <= 0 || fraction <= 0) return valueMs;
  const factor = 1 - fraction + random() * 2 * fraction;
  return Math.min(maxMs, Math.max(0, valueMs * factor));
}

export function computeDelay(policy: RetryPolicy, attempt: number, jitter?: JitterOptions): number {
  let delay: number;
  switch (policy.strategy) {
    case "exponential_backoff":
      delay = exponentialDelay(policy.baseDelayMs, policy.maxDelayMs, policy.exponentialBase, attempt);
      break;
    case "linear_backoff":
      delay = linearDelay(policy.baseDelayMs, policy.maxDelayMs, attempt);
      break;
    case "fixed_delay":
      delay = Math.min(policy.maxDelayMs, policy.baseDelayMs);
      break;
    case "immediate_fail":
      return 0;
  }

  if (!jitter) return delay;
  return applyJitter(delay, jitter.fraction, policy.maxDelayMs, jitter.random);
}

export class BackoffCalculator {
  private readonly jitter?: JitterOptions;

  constructor(options: { jitter?: boolean; jitterFraction?: number; random?: () => number } = {}) {
    if (options.jitter) {
      this.jitter = { fraction: options.jitterFraction ?? 0.1, random: options.random };
    }
  }

  /**
   * Delay before retry number `attempt` (zero-based)
   */
  delay(policy: RetryPolicy, attempt: number): number {
    return computeDelay(policy, attempt, this.jitter);
  }

  /**
   * Whether another retry is allowed after `retryCount` retries so far
   */
  shouldRetry(policy: RetryPolicy, retryCount: number): boolean {
    if (policy.strategy === "immediate_fail") return false;
    return retryCount < policy.maxRetries;
  }
}
