/**
 * Pure utility functions for exponential backoff calculation.
 */

export interface BackoffOptions {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
}

const DEFAULT_BACKOFF_OPTIONS: Required<BackoffOptions> = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - 0-indexed, so the first retry is attempt 0
 *
 * @example
 * // Default: 1s, 2s, 4s, 8s, 16s, 30s (capped)
 * calculateBackoff(0) // 1000
 * calculateBackoff(5) // 30000 (capped)
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs } = {
    ...DEFAULT_BACKOFF_OPTIONS,
    ...options,
  };

  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Delay between startup probe attempts: retryDelayMs, doubling, capped at ten times the base.
 */
export function calculateProbeBackoff(attempt: number, retryDelayMs: number): number {
  return calculateBackoff(attempt, {
    baseDelayMs: retryDelayMs,
    maxDelayMs: retryDelayMs * 10,
  });
}
