/**
 * Builds rule contexts from in-memory indexes.
 */
import { mergeConfig } from '../../../../src/core/config/loader.js';
import type { Config } from '../../../../src/core/config/schema.js';
import { GraphBuilder } from '../../../../src/core/graph/builder.js';
import { loadEcosystem } from '../../../../src/core/metadata/loader.js';
import { LinkProber } from '../../../../src/core/probe/prober.js';
import type { FetchLike } from '../../../../src/core/probe/types.js';
import type { RuleContext } from '../../../../src/core/rules/types.js';

export const TEST_NOW = new Date('2026-10-01T00:00:00Z');

export const offlineFetch: FetchLike = async (url) => {
  throw new Error(`unexpected request to ${url}`);
};

export interface ContextOptions {
  config?: Partial<Config>;
  now?: Date;
  fetch?: FetchLike;
  signal?: AbortSignal;
}

/**
 * A complete descriptor; tests override single fields.
 */
export function repo(name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name,
    layer: 'runtime',
    status: 'stable',
    short_description: `${name} repository`,
    dependencies: [],
    tags: ['core'],
    license: 'MIT',
    ...extra,
  };
}

export function buildContext(index: unknown, options: ContextOptions = {}): RuleContext {
  const config = mergeConfig({ retry_backoff_ms: 1, timeout_ms: 200, probe_budget_ms: 2000, ...options.config });
  const load = loadEcosystem(
    { index },
    { requiredFields: config.required_fields, maxDescriptionLength: config.max_description_length }
  );
  const graph = new GraphBuilder(load.records, {
    centralThreshold: config.central_threshold,
    maxCycles: config.max_cycles,
  }).build();

  return {
    graph,
    declarations: load.declarations,
    loadFindings: load.findings,
    config,
    now: options.now ?? TEST_NOW,
    prober: new LinkProber(
      {
        concurrency: config.concurrency,
        timeoutMs: config.timeout_ms,
        retries: config.retries,
        retryBackoffMs: config.retry_backoff_ms,
        budgetMs: config.probe_budget_ms,
      },
      options.fetch ?? offlineFetch
    ),
    signal: options.signal,
  };
}
