/**
 * Concurrent URL reachability checks.
 *
 * A fixed pool of workers drains a queue of unique URLs. Each request gets
 * its own timeout; transient failures are retried with linear backoff. An
 * aggregate budget and an optional external signal both stop the pool:
 * in-flight requests are aborted and URLs without an outcome are recorded
 * as budget timeouts or cancellations.
 */
import { logger } from '../../utils/logger.js';
import type { FetchLike, ProbeConfig, ProbeOutcome } from './types.js';

const log = logger.child('probe');

export const DEFAULT_PROBE_CONFIG: ProbeConfig = {
  concurrency: 8,
  timeoutMs: 5000,
  retries: 2,
  retryBackoffMs: 250,
  budgetMs: 60000,
};

type AttemptResult =
  | { kind: 'status'; status: number }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string }
  | { kind: 'stopped' };

type StopReason = 'budget' | 'cancel';

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * Resolve after `ms`, or as soon as the signal aborts.
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export class LinkProber {
  private config: ProbeConfig;
  private fetchImpl: FetchLike;

  constructor(config: Partial<ProbeConfig> = {}, fetchImpl: FetchLike = defaultFetch) {
    this.config = { ...DEFAULT_PROBE_CONFIG, ...config };
    this.fetchImpl = fetchImpl;
  }

  /**
   * Probe each unique URL at most once.
   * The returned map is ordered by URL and holds an outcome for every input.
   */
  async probe(urls: Iterable<string>, signal?: AbortSignal): Promise<Map<string, ProbeOutcome>> {
    const unique = [...new Set(urls)].sort();
    const outcomes = new Map<string, ProbeOutcome>();
    const attempts = new Map<string, number>();
    let closed = false;

    const record = (url: string, outcome: ProbeOutcome): void => {
      if (closed || outcomes.has(url)) return;
      outcomes.set(url, outcome);
    };

    const stop = new AbortController();
    const state: { stopReason: StopReason | null } = { stopReason: null };
    const halt = (reason: StopReason): void => {
      if (state.stopReason !== null) return;
      state.stopReason = reason;
      log.debug(reason === 'budget' ? `Probe budget of ${this.config.budgetMs} ms exhausted` : 'Probing cancelled');
      stop.abort();
    };

    const onCancel = (): void => halt('cancel');
    const budgetTimer = setTimeout(() => halt('budget'), this.config.budgetMs);
    if (signal?.aborted) {
      halt('cancel');
    } else {
      signal?.addEventListener('abort', onCancel, { once: true });
    }

    const queue = [...unique];
    const worker = async (): Promise<void> => {
      while (!stop.signal.aborted) {
        const url = queue.shift();
        if (url === undefined) return;
        const outcome = await this.probeOne(url, stop.signal, attempts);
        if (outcome !== null) record(url, outcome);
      }
    };

    const stopped = new Promise<void>((resolve) => {
      if (stop.signal.aborted) resolve();
      else stop.signal.addEventListener('abort', () => resolve(), { once: true });
    });
    const workerCount = Math.max(1, Math.min(this.config.concurrency, unique.length));
    const pool = Promise.all(Array.from({ length: workerCount }, () => worker()));

    try {
      await Promise.race([pool, stopped]);
    } finally {
      clearTimeout(budgetTimer);
      signal?.removeEventListener('abort', onCancel);
      closed = true;
    }

    const result = new Map<string, ProbeOutcome>();
    for (const url of unique) {
      const outcome = outcomes.get(url);
      if (outcome) {
        result.set(url, outcome);
      } else if (state.stopReason === 'cancel') {
        result.set(url, { kind: 'cancelled' });
      } else {
        result.set(url, { kind: 'timeout', reason: 'budget', attempts: attempts.get(url) ?? 0 });
      }
    }
    return result;
  }

  /**
   * Probe one URL with retries. Returns null when stopped before an outcome.
   */
  private async probeOne(
    url: string,
    stop: AbortSignal,
    attempts: Map<string, number>
  ): Promise<ProbeOutcome | null> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      return { kind: 'invalid-url', message: error instanceof Error ? error.message : String(error) };
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return { kind: 'invalid-url', message: `Unsupported protocol ${parsed.protocol}` };
    }

    for (let attempt = 1; ; attempt++) {
      attempts.set(url, attempt);
      const result = await this.attempt(url, stop);

      switch (result.kind) {
        case 'stopped':
          return null;
        case 'timeout':
          return { kind: 'timeout', reason: 'request', attempts: attempt };
        case 'status':
          if (result.status < 500 || attempt > this.config.retries) {
            return { kind: 'status', status: result.status, attempts: attempt };
          }
          break;
        case 'error':
          if (attempt > this.config.retries) {
            return { kind: 'connection-error', message: result.message, attempts: attempt };
          }
          break;
      }

      const wait = this.config.retryBackoffMs * attempt;
      log.debug(`Retrying ${url} in ${wait} ms (attempt ${attempt} failed)`);
      await delay(wait, stop);
      if (stop.aborted) return null;
    }
  }

  /**
   * One request: HEAD, falling back to GET for servers that reject HEAD.
   */
  private async attempt(url: string, stop: AbortSignal): Promise<AttemptResult> {
    if (stop.aborted) return { kind: 'stopped' };

    const controller = new AbortController();
    const state = { timedOut: false };
    const timer = setTimeout(() => {
      state.timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onStop = (): void => controller.abort();
    stop.addEventListener('abort', onStop, { once: true });

    try {
      let response = await this.fetchImpl(url, { method: 'HEAD', redirect: 'manual', signal: controller.signal });
      if (response.status === 405) {
        response = await this.fetchImpl(url, { method: 'GET', redirect: 'manual', signal: controller.signal });
        await response.body?.cancel();
      }
      return { kind: 'status', status: response.status };
    } catch (error) {
      if (stop.aborted) return { kind: 'stopped' };
      if (state.timedOut) return { kind: 'timeout' };
      return { kind: 'error', message: error instanceof Error ? error.message : String(error) };
    } finally {
      clearTimeout(timer);
      stop.removeEventListener('abort', onStop);
    }
  }
}
