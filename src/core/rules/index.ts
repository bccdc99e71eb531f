export { RULE_IDS, isRuleId } from './types.js';
export type { AuditRule, RuleContext, RuleId } from './types.js';
export { BaseRule } from './base.js';
export type { FindingOptions } from './base.js';
export { CompletenessRule } from './completeness.js';
export { DependencyValidityRule } from './dependencies.js';
export { CycleFreedomRule } from './cycles.js';
export { StalenessRule, extractRepoCounts, daysSince, INDEX_SUBJECT } from './staleness.js';
export { LinkLivenessRule, collectUrls } from './links.js';
export { RuleEngine, createDefaultRules } from './engine.js';
