/**
 * exponential backoff with ±25% jitter, shared by every retry in a sync cycle.
 */

export const MIN_DELAY_SECONDS = 0.1;
export const JITTER_RATIO = 0.25;

export interface BackoffOptions {
  baseDelaySeconds: number;
  maxDelaySeconds: number;
  /** [0, 1) */
  random?: () => number;
}

/** delay before retrying after failed attempt `attempt` (0-based), in seconds */
export function backoffDelaySeconds(attempt: number, options: BackoffOptions): number {
  const random = options.random ?? Math.random;
  const capped = Math.min(options.baseDelaySeconds * 2 ** attempt, options.maxDelaySeconds);
  const jitter = capped * JITTER_RATIO * (2 * random() - 1);
  return Math.max(MIN_DELAY_SECONDS, Math.min(capped + jitter, options.maxDelaySeconds));
}
