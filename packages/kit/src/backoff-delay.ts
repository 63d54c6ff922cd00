/**
 * Exponential backoff: base * 2^(attempt-1), capped at maxMs.
 * Attempt numbers start at 1.
 */
export function backoffDelay(
  attempt: number,
  baseMs: number = 1000,
  maxMs: number = 60000,
): number {
  const delay = baseMs * Math.pow(2, Math.max(attempt, 1) - 1);
  return Math.min(delay, maxMs);
}
