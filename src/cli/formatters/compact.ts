/**
 * Compact output formatter for CI logs.
 * Format: SEVERITY code subject: message
 */
import type { Finding } from '../../core/findings/types.js';
import type { Report } from '../../core/report/types.js';
import type { IFormatter, FormatOptions } from './types.js';

const SEVERITY_LABELS: Record<Finding['severity'], string> = {
  blocking: 'ERROR',
  warning: 'WARN',
  info: 'INFO',
};

export class CompactFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  formatReport(report: Report): string {
    const lines = report.findings
      .filter((f) => !this.errorsOnly || f.severity === 'blocking')
      .map((f) => this.formatFinding(f));

    lines.push('');
    lines.push(this.formatSummary(report));
    return lines.join('\n');
  }

  private formatFinding(finding: Finding): string {
    return `${SEVERITY_LABELS[finding.severity]} ${finding.code} ${finding.subject}: ${finding.message}`;
  }

  private formatSummary(report: Report): string {
    const { blocking, warning, info } = report.summary;
    const parts: string[] = [];

    if (blocking > 0) {
      parts.push(`${blocking} error${blocking !== 1 ? 's' : ''}`);
    }
    if (warning > 0) {
      parts.push(`${warning} warning${warning !== 1 ? 's' : ''}`);
    }
    if (info > 0) {
      parts.push(`${info} info`);
    }
    if (parts.length === 0) {
      parts.push('0 issues');
    }

    const incomplete = report.complete ? '' : ' (incomplete)';
    return `SUMMARY: ${parts.join(', ')}${incomplete}`;
  }
}
