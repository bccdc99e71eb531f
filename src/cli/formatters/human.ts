import chalk from 'chalk';
import { SEVERITIES, type Finding, type Severity } from '../../core/findings/types.js';
import type { Report } from '../../core/report/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim';

const SEVERITY_COLORS: Record<Severity, Color> = {
  blocking: 'red',
  warning: 'yellow',
  info: 'blue',
};

const SEVERITY_TITLES: Record<Severity, string> = {
  blocking: 'BLOCKING',
  warning: 'WARNINGS',
  info: 'INFO',
};

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      errorsOnly: options.errorsOnly ?? false,
    };
  }

  formatReport(report: Report): string {
    const lines: string[] = [];

    for (const severity of SEVERITIES) {
      if (this.options.errorsOnly && severity !== 'blocking') continue;

      const group = report.findings.filter((f) => f.severity === severity);
      if (group.length === 0) continue;

      lines.push(this.colorize(`${SEVERITY_TITLES[severity]} (${group.length}):`, SEVERITY_COLORS[severity]));
      for (const finding of group) {
        lines.push(...this.formatFinding(finding));
      }
      lines.push('');
    }

    lines.push(this.formatSummary(report));
    return lines.join('\n');
  }

  private formatFinding(finding: Finding): string[] {
    const lines = [`   ${this.colorize(finding.code, 'dim')} ${finding.subject}: ${finding.message}`];
    if (finding.remediation && this.options.verbose) {
      lines.push(`      ${this.colorize(`Fix: ${finding.remediation}`, 'cyan')}`);
    }
    return lines;
  }

  private formatSummary(report: Report): string {
    const { summary } = report;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const status = report.passed
      ? this.colorize(summary.warning > 0 ? '⚠ PASSED WITH WARNINGS' : '✓ PASSED', summary.warning > 0 ? 'yellow' : 'green')
      : this.colorize('✗ FAILED', 'red');
    lines.push(status);

    const blockingText = this.colorize(`${summary.blocking} blocking`, 'red');
    const warningText = this.colorize(`${summary.warning} warnings`, 'yellow');
    const infoText = this.colorize(`${summary.info} info`, 'blue');
    lines.push(`SUMMARY: ${blockingText}, ${warningText}, ${infoText}`);

    if (!report.complete) {
      lines.push(this.colorize('Audit cancelled before all checks finished; report is incomplete', 'yellow'));
    }

    return lines.join('\n');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
