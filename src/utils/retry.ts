export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Exponential backoff: `baseMs * 2^attempt` for attempt 0, 1, 2...
 * A server-provided wait wins when it is longer.
 */
export function computeBackoff(attempt: number, baseMs: number, retryAfterMs?: number): number {
  const exponential = baseMs * 2 ** attempt;
  return retryAfterMs !== undefined && retryAfterMs > exponential ? retryAfterMs : exponential;
}

/** Parses a `Retry-After` header given in seconds. */
export function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
