export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff: `baseMs` doubled for every attempt after the first,
 * capped at `maxMs`.
 *
 * @param attempt - 1-based attempt number that just failed
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** Math.max(attempt - 1, 0), maxMs);
}
