/**
 * Backoff utilities
 *
 * Delay schedule between status calls.
 */

/**
 * Calculate the delay after a status call using exponential backoff.
 *
 * @param attempt - Number of calls already followed by a delay (0-based)
 * @param baseMs - Delay after the first call
 * @param maxMs - Delay ceiling
 * @param multiplier - Growth factor
 */
export function calculateBackoff(attempt: number, baseMs: number, maxMs: number, multiplier: number): number {
  const delay = baseMs * Math.pow(multiplier, attempt);
  return Math.min(delay, maxMs);
}

/**
 * Spread a delay by up to `jitter` of its value in either direction.
 *
 * @param random - Source of values in [0, 1)
 */
export function applyJitter(ms: number, jitter: number, random: () => number = Math.random): number {
  if (jitter <= 0) {
    return ms;
  }
  const jitterRange = ms * jitter;
  const offset = (random() * 2 - 1) * jitterRange;
  return Math.max(0, ms + offset);
}
