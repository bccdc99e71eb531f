import { FindingCodes, type Finding } from '../findings/types.js';
import type { RepositoryRecord } from '../metadata/types.js';
import { BaseRule } from './base.js';
import type { RuleContext } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** "12 repos", "40 repositories" */
const REPO_COUNT_PATTERN = /\b(\d+)\s+(?:repos?|repositories)\b/gi;

export const INDEX_SUBJECT = 'ecosystem-index';

/**
 * Every repository count mentioned in a piece of text, in order of appearance.
 */
export function extractRepoCounts(text: string): number[] {
  return [...text.matchAll(REPO_COUNT_PATTERN)].map((match) => Number(match[1]));
}

/**
 * Whole days between a YYYY-MM-DD date (UTC midnight) and `now`.
 * Returns null for dates that do not parse.
 */
export function daysSince(date: string, now: Date): number | null {
  const time = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(time)) return null;
  return Math.floor((now.getTime() - time) / DAY_MS);
}

/**
 * Published statistics must match the live index, and long-untouched
 * repositories are flagged as deprecation candidates.
 */
export class StalenessRule extends BaseRule {
  readonly id = 'staleness' as const;
  readonly category = 'staleness' as const;

  run(context: RuleContext): Finding[] {
    const { graph, declarations, config, now } = context;
    const live = graph.records.size;
    const findings: Finding[] = [];

    if (declarations.totalRepos !== undefined && declarations.totalRepos !== live) {
      findings.push(
        this.createFinding(
          'warning',
          FindingCodes.STALE_STATISTIC,
          INDEX_SUBJECT,
          `Index declares ${declarations.totalRepos} repositories but contains ${live}`,
          { remediation: 'Regenerate the index statistics' }
        )
      );
    }

    for (const record of graph.records.values()) {
      findings.push(...this.checkDescriptions(record, live));

      if (record.updated === undefined) continue;
      const age = daysSince(record.updated, now);
      if (age === null) {
        findings.push(
          this.createFinding(
            'info',
            FindingCodes.UNPARSABLE_DATE,
            record.name,
            `Cannot read updated date '${record.updated}'; age not checked`,
            { remediation: 'Write the date as YYYY-MM-DD' }
          )
        );
      } else if (!record.deprecated && age > config.staleness_threshold_days) {
        findings.push(
          this.createFinding(
            'info',
            FindingCodes.DEPRECATION_CANDIDATE,
            record.name,
            `Not updated for ${age} days (since ${record.updated}); candidate for deprecated status`,
            { remediation: "Review the repository and set status to 'deprecated' if it is no longer maintained" }
          )
        );
      }
    }

    return findings;
  }

  private checkDescriptions(record: RepositoryRecord, live: number): Finding[] {
    const texts = [record.shortDescription, record.longDescription].filter(
      (text): text is string => text !== undefined
    );
    const declared = new Set(texts.flatMap(extractRepoCounts));

    return [...declared]
      .filter((count) => count !== live)
      .sort((a, b) => a - b)
      .map((count) =>
        this.createFinding(
          'warning',
          FindingCodes.STALE_STATISTIC,
          record.name,
          `Description mentions ${count} repositories but the index contains ${live}`,
          { remediation: `Update the description to mention ${live} repositories` }
        )
      );
  }
}
