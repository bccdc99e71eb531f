/**
 * Link probe type definitions.
 */

/**
 * The subset of `fetch` the prober relies on. Global `fetch` satisfies it;
 * tests pass in-process fakes.
 */
export type FetchLike = (
  url: string,
  init: { method: 'HEAD' | 'GET'; redirect: 'manual'; signal: AbortSignal }
) => Promise<{ status: number; body?: { cancel(): Promise<void> } | null }>;

export interface ProbeConfig {
  /** Maximum concurrent probes */
  concurrency: number;
  /** Per-request timeout */
  timeoutMs: number;
  /** Retries after a transient failure (5xx, connection error) */
  retries: number;
  /** Backoff step; the wait before retry n is n × retryBackoffMs */
  retryBackoffMs: number;
  /** Wall-clock budget for the whole probe call */
  budgetMs: number;
}

export type ProbeOutcome =
  | { kind: 'status'; status: number; attempts: number }
  | { kind: 'timeout'; reason: 'request' | 'budget'; attempts: number }
  | { kind: 'connection-error'; message: string; attempts: number }
  | { kind: 'invalid-url'; message: string }
  | { kind: 'cancelled' };

/**
 * 2xx and 3xx responses count as live.
 */
export function isLive(outcome: ProbeOutcome): boolean {
  return outcome.kind === 'status' && outcome.status >= 200 && outcome.status < 400;
}
