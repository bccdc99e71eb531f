import type { Finding, Severity } from '../findings/types.js';

export interface ReportSummary {
  blocking: number;
  warning: number;
  info: number;
  total: number;
}

/**
 * Ordered, immutable result of one audit run.
 */
export interface Report {
  /** No blocking finding */
  readonly passed: boolean;
  /** False when the run was cancelled before every check finished */
  readonly complete: boolean;
  readonly summary: ReportSummary;
  /** Sorted by severity, category, subject, code, message */
  readonly findings: readonly Finding[];
}

export interface ReportOptions {
  complete?: boolean;
}

/**
 * Stable machine-readable form: findings partitioned by severity.
 */
export interface SerializedReport {
  passed: boolean;
  complete: boolean;
  summary: ReportSummary;
  findings: Record<Severity, Finding[]>;
}
