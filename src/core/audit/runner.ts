/**
 * One audit run: load, build the graph, run the rules, build the report.
 * Nothing survives between runs.
 */
import { getDefaultConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { GraphBuilder } from '../graph/builder.js';
import type { EcosystemGraph } from '../graph/types.js';
import { loadEcosystem } from '../metadata/loader.js';
import type { EcosystemInput } from '../metadata/types.js';
import { LinkProber } from '../probe/prober.js';
import type { FetchLike } from '../probe/types.js';
import { buildReport } from '../report/builder.js';
import type { Report } from '../report/types.js';
import { RuleEngine } from '../rules/engine.js';
import { RULE_IDS, type RuleId } from '../rules/types.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('audit');

export interface AuditOptions {
  config?: Config;
  /** Rules to run; all when omitted */
  rules?: readonly RuleId[];
  /** Aborting yields a partial report flagged incomplete */
  signal?: AbortSignal;
  /** Reference time for staleness checks */
  now?: Date;
  fetch?: FetchLike;
}

export interface AuditResult {
  report: Report;
  graph: EcosystemGraph;
}

/**
 * Audit an ecosystem index. Throws MalformedMetadataError when the input
 * cannot be read as an index at all; every other anomaly is a finding.
 */
export async function runAudit(input: EcosystemInput, options: AuditOptions = {}): Promise<AuditResult> {
  const config = options.config ?? getDefaultConfig();

  const load = loadEcosystem(input, {
    requiredFields: config.required_fields,
    maxDescriptionLength: config.max_description_length,
  });

  const graph = new GraphBuilder(load.records, {
    centralThreshold: config.central_threshold,
    maxCycles: config.max_cycles,
  }).build();

  const prober = new LinkProber(
    {
      concurrency: config.concurrency,
      timeoutMs: config.timeout_ms,
      retries: config.retries,
      retryBackoffMs: config.retry_backoff_ms,
      budgetMs: config.probe_budget_ms,
    },
    options.fetch
  );

  const findings = await new RuleEngine().run(
    {
      graph,
      declarations: load.declarations,
      loadFindings: load.findings,
      config,
      now: options.now ?? new Date(),
      prober,
      signal: options.signal,
    },
    options.rules ?? RULE_IDS
  );

  const complete = !(options.signal?.aborted ?? false);
  if (!complete) {
    log.warn('Audit cancelled; report is incomplete');
  }

  const report = buildReport(findings, { complete });
  log.debug(`Audit finished: ${report.summary.total} finding(s), passed=${report.passed}`);
  return { report, graph };
}
