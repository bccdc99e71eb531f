/**
 * Runs audit rules over one graph, isolating rule failures.
 */
import { logger } from '../../utils/logger.js';
import { createFinding } from '../findings/factory.js';
import { FindingCodes, type Finding } from '../findings/types.js';
import { CompletenessRule } from './completeness.js';
import { CycleFreedomRule } from './cycles.js';
import { DependencyValidityRule } from './dependencies.js';
import { LinkLivenessRule } from './links.js';
import { StalenessRule } from './staleness.js';
import { RULE_IDS, type AuditRule, type RuleContext, type RuleId } from './types.js';

const log = logger.child('rules');

export function createDefaultRules(): AuditRule[] {
  return [
    new CompletenessRule(),
    new DependencyValidityRule(),
    new CycleFreedomRule(),
    new StalenessRule(),
    new LinkLivenessRule(),
  ];
}

export class RuleEngine {
  private rules: AuditRule[];

  constructor(rules: AuditRule[] = createDefaultRules()) {
    this.rules = rules;
  }

  /**
   * Run the selected rules (all when omitted) one after another.
   * A rule that throws yields a single blocking finding; the others still run.
   */
  async run(context: RuleContext, ruleIds: readonly RuleId[] = RULE_IDS): Promise<Finding[]> {
    const selected = this.rules.filter((rule) => ruleIds.includes(rule.id));
    const findings: Finding[] = [];

    for (const rule of selected) {
      try {
        const result = await rule.run(context);
        log.debug(`Rule ${rule.id} produced ${result.length} finding(s)`);
        findings.push(...result);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.warn(`Rule ${rule.id} failed: ${message}`);
        findings.push(
          createFinding({
            severity: 'blocking',
            category: rule.category,
            code: FindingCodes.RULE_FAILED,
            rule: rule.id,
            subject: rule.id,
            message: `Check failed: ${message}`,
          })
        );
      }
    }

    return findings;
  }
}
