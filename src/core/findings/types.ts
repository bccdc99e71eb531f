/**
 * Finding type definitions.
 */

export const SEVERITIES = ['blocking', 'warning', 'info'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const CATEGORIES = ['metadata', 'dependency', 'link', 'staleness'] as const;
export type Category = (typeof CATEGORIES)[number];

/**
 * One audit result. Frozen once created.
 */
export interface Finding {
  readonly severity: Severity;
  readonly category: Category;
  /** Finding code (M001, D002, ...) */
  readonly code: string;
  /** Id of the rule or stage that produced the finding */
  readonly rule: string;
  /** Repository name or URL */
  readonly subject: string;
  readonly message: string;
  /** Suggested remediation for a human reviewer */
  readonly remediation?: string;
}

export const FindingCodes = {
  // Metadata (M001-M009)
  MISSING_FIELD: 'M001',
  INVALID_FIELD_TYPE: 'M002',
  DESCRIPTION_TOO_LONG: 'M003',
  DUPLICATE_NAME: 'M004',
  NAME_MISMATCH: 'M005',
  UNKNOWN_FIELD: 'M006',
  INVALID_LAYER: 'M007',
  INVALID_STATUS: 'M008',
  UNKNOWN_OVERRIDE: 'M009',
  EMPTY_TAGS: 'M010',

  // Dependency (D001-D004)
  UNRESOLVED_DEPENDENCY: 'D001',
  CYCLE_DETECTED: 'D002',
  MIXED_CYCLE: 'D003',
  INVALID_EDGE_TYPE: 'D004',

  // Link (L001-L002)
  DEAD_LINK: 'L001',
  PROBE_TIMEOUT: 'L002',

  // Staleness (T001-T003)
  STALE_STATISTIC: 'T001',
  DEPRECATION_CANDIDATE: 'T002',
  UNPARSABLE_DATE: 'T003',

  // Rule engine
  RULE_FAILED: 'R001',
} as const;

export type FindingCode = (typeof FindingCodes)[keyof typeof FindingCodes];
