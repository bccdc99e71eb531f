/**
 * Rule engine type definitions.
 */
import type { Config } from '../config/schema.js';
import type { Category, Finding } from '../findings/types.js';
import type { EcosystemGraph } from '../graph/types.js';
import type { IndexDeclarations } from '../metadata/types.js';
import type { LinkProber } from '../probe/prober.js';

export const RULE_IDS = ['completeness', 'dependencies', 'cycles', 'staleness', 'links'] as const;
export type RuleId = (typeof RULE_IDS)[number];

export function isRuleId(value: string): value is RuleId {
  return RULE_IDS.some((item) => item === value);
}

/**
 * Everything a rule may look at. Rules never mutate it.
 */
export interface RuleContext {
  graph: EcosystemGraph;
  declarations: IndexDeclarations;
  /** Findings the loader produced while reading descriptors */
  loadFindings: readonly Finding[];
  config: Config;
  /** Reference time for age-based checks */
  now: Date;
  prober: LinkProber;
  signal?: AbortSignal;
}

/**
 * An independent check producing zero or more findings.
 */
export interface AuditRule {
  readonly id: RuleId;
  readonly category: Category;
  run(context: RuleContext): Finding[] | Promise<Finding[]>;
}
