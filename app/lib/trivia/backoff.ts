export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 2000, capMs: 30_000 };

/**
 * Delay before retry number `retry` (1-based): base, 2*base, 4*base, ... capped.
 */
export function backoffDelay(retry: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  if (retry < 1) return 0;
  const delay = policy.baseMs * 2 ** (retry - 1);
  return Math.min(policy.capMs, delay);
}

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
