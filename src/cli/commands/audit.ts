/**
 * `ecoaudit audit`: run the checks against an index and gate on the result.
 */
import { Command } from 'commander';
import { loadConfig, mergeConfig } from '../../core/config/loader.js';
import type { Config, ExitCodes } from '../../core/config/schema.js';
import { runAudit } from '../../core/audit/runner.js';
import { readIndexFile, readOverridesDir } from '../../core/metadata/reader.js';
import type { Report } from '../../core/report/types.js';
import { RULE_IDS, isRuleId, type RuleId } from '../../core/rules/types.js';
import { JsonFormatter, HumanFormatter, CompactFormatter, OUTPUT_FORMATS } from '../formatters/index.js';
import type { IFormatter, OutputFormat } from '../formatters/types.js';
import { logger as log } from '../../utils/logger.js';
import { parseInteger } from './options.js';

export interface AuditCommandOptions {
  config?: string;
  overrides?: string;
  rules?: string;
  skipLinks?: boolean;
  format: string;
  errorsOnly?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  asOf?: string;
  concurrency?: number;
  timeout?: number;
  retries?: number;
  budget?: number;
  staleDays?: number;
  bestEffort?: string[];
}

/**
 * Parse a comma-separated rule list. Throws on unknown ids.
 */
export function parseRuleList(value: string): RuleId[] {
  const ids = value.split(',').map((s) => s.trim()).filter(Boolean);
  const unknown = ids.filter((id) => !isRuleId(id));
  if (unknown.length > 0) {
    throw new Error(`Unknown rule(s): ${unknown.join(', ')}. Use: ${RULE_IDS.join(', ')}`);
  }
  return RULE_IDS.filter((id) => ids.includes(id));
}

/**
 * Rules to run after applying --rules and --skip-links.
 */
export function selectRules(rules: string | undefined, skipLinks: boolean): RuleId[] {
  const selected = rules ? parseRuleList(rules) : [...RULE_IDS];
  return skipLinks ? selected.filter((id) => id !== 'links') : selected;
}

/**
 * Config values given on the command line.
 */
export function configOverrides(options: AuditCommandOptions): Partial<Config> {
  const overrides: Partial<Config> = {};
  if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
  if (options.timeout !== undefined) overrides.timeout_ms = options.timeout;
  if (options.retries !== undefined) overrides.retries = options.retries;
  if (options.budget !== undefined) overrides.probe_budget_ms = options.budget;
  if (options.staleDays !== undefined) overrides.staleness_threshold_days = options.staleDays;
  if (options.bestEffort !== undefined) overrides.best_effort_hosts = options.bestEffort;
  return overrides;
}

/**
 * An incomplete run never passes the gate, even with no blocking findings.
 */
export function getExitCode(report: Report, exitCodes: ExitCodes): number {
  if (!report.passed || !report.complete) return exitCodes.error;
  if (report.summary.warning > 0) return exitCodes.warning_only;
  return exitCodes.success;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Create formatter based on output format. */
function createFormatter(format: OutputFormat, options: AuditCommandOptions): IFormatter {
  const errorsOnly = options.errorsOnly ?? false;
  switch (format) {
    case 'json':
      return new JsonFormatter({ errorsOnly });
    case 'compact':
      return new CompactFormatter({ errorsOnly });
    case 'human':
      return new HumanFormatter({
        colors: process.stdout.isTTY ?? false,
        verbose: options.verbose ?? false,
        errorsOnly,
      });
  }
}

function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid date: ${value}`);
  }
  return date;
}

/**
 * Create the audit command.
 */
export function createAuditCommand(): Command {
  return new Command('audit')
    .description('Audit an ecosystem index for completeness, dependencies, cycles, links and staleness')
    .argument('[index]', 'Ecosystem index file (JSON or YAML)', 'ecosystem-index.json')
    .option('-c, --config <path>', 'Path to config file')
    .option('--overrides <dir>', 'Directory of <repo>/metadata.yml overrides')
    .option('--rules <ids>', `Comma-separated rules to run (${RULE_IDS.join(', ')})`)
    .option('--skip-links', 'Do not probe links')
    .option('-f, --format <format>', 'Output format (human, json, compact)', 'human')
    .option('--errors-only', 'Only show blocking findings')
    .option('--as-of <date>', 'Reference date for staleness checks')
    .option('--concurrency <n>', 'Concurrent link probes', (v) => parseInteger(v, '--concurrency'))
    .option('--timeout <ms>', 'Per-request timeout', (v) => parseInteger(v, '--timeout'))
    .option('--retries <n>', 'Retries for transient probe failures', (v) => parseInteger(v, '--retries'))
    .option('--budget <ms>', 'Total time budget for link probing', (v) => parseInteger(v, '--budget'))
    .option('--stale-days <n>', 'Days without update before suggesting deprecation', (v) =>
      parseInteger(v, '--stale-days')
    )
    .option('--best-effort <hosts...>', 'Hosts whose link failures are warnings only')
    .option('-v, --verbose', 'Show debug output and remediation hints')
    .option('-q, --quiet', 'Suppress log output')
    .action(async (indexPath: string, options: AuditCommandOptions) => {
      if (options.verbose) log.setLevel('debug');
      if (options.quiet) log.setLevel('silent');

      const controller = new AbortController();
      const onInterrupt = (): void => {
        log.warn('Interrupted; stopping probes and reporting what has been checked');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const format = options.format;
        if (!isOutputFormat(format)) {
          throw new Error(`Invalid format: ${format}. Use: ${OUTPUT_FORMATS.join(', ')}`);
        }
        const rules = selectRules(options.rules, options.skipLinks ?? false);
        const fileConfig = await loadConfig(process.cwd(), options.config);
        const config = mergeConfig({ ...fileConfig, ...configOverrides(options) });

        const index = await readIndexFile(indexPath);
        const overrides = options.overrides ? await readOverridesDir(options.overrides) : undefined;

        const { report } = await runAudit(
          { index, overrides },
          {
            config,
            rules,
            signal: controller.signal,
            now: options.asOf ? parseDate(options.asOf) : undefined,
          }
        );

        console.log(createFormatter(format, options).formatReport(report));
        process.exit(getExitCode(report, config.exit_codes));
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}
