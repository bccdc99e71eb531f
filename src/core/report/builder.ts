import { CATEGORIES, SEVERITIES, type Finding, type Severity } from '../findings/types.js';
import type { Report, ReportOptions, SerializedReport } from './types.js';

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Total order over findings. Output never depends on the order checks
 * or probes finished in.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITIES.indexOf(a.severity) - SEVERITIES.indexOf(b.severity) ||
    CATEGORIES.indexOf(a.category) - CATEGORIES.indexOf(b.category) ||
    compareText(a.subject, b.subject) ||
    compareText(a.code, b.code) ||
    compareText(a.message, b.message) ||
    compareText(a.rule, b.rule)
  );
}

function findingKey(f: Finding): string {
  return [f.severity, f.category, f.code, f.rule, f.subject, f.message, f.remediation ?? ''].join('\u0000');
}

export function buildReport(findings: readonly Finding[], options: ReportOptions = {}): Report {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of findings) {
    const key = findingKey(finding);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(finding);
  }
  unique.sort(compareFindings);

  const count = (severity: Severity): number => unique.filter((f) => f.severity === severity).length;
  const summary = {
    blocking: count('blocking'),
    warning: count('warning'),
    info: count('info'),
    total: unique.length,
  };

  return Object.freeze({
    passed: summary.blocking === 0,
    complete: options.complete ?? true,
    summary,
    findings: Object.freeze(unique),
  });
}

export function serializeReport(report: Report): SerializedReport {
  const bySeverity = (severity: Severity): Finding[] => report.findings.filter((f) => f.severity === severity);
  return {
    passed: report.passed,
    complete: report.complete,
    summary: { ...report.summary },
    findings: {
      blocking: bySeverity('blocking'),
      warning: bySeverity('warning'),
      info: bySeverity('info'),
    },
  };
}

/**
 * Plain-text rendering without color codes.
 */
export function renderReport(report: Report): string {
  const lines: string[] = [];

  for (const severity of SEVERITIES) {
    const group = report.findings.filter((f) => f.severity === severity);
    if (group.length === 0) continue;
    lines.push(`${severity.toUpperCase()} (${group.length})`);
    for (const f of group) {
      lines.push(`  [${f.code}] ${f.subject}: ${f.message}`);
      if (f.remediation) {
        lines.push(`      fix: ${f.remediation}`);
      }
    }
    lines.push('');
  }

  const { blocking, warning, info } = report.summary;
  const verdict = report.passed ? (warning > 0 ? 'PASSED WITH WARNINGS' : 'PASSED') : 'FAILED';
  lines.push(`${verdict}: ${blocking} blocking, ${warning} warning(s), ${info} info`);
  if (!report.complete) {
    lines.push('Audit incomplete: the run was cancelled before all checks finished');
  }

  return lines.join('\n');
}
