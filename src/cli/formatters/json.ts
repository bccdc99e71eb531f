import { serializeReport } from '../../core/report/builder.js';
import type { Report } from '../../core/report/types.js';
import type { IFormatter, FormatOptions } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  formatReport(report: Report): string {
    const serialized = serializeReport(report);
    if (this.errorsOnly) {
      serialized.findings.warning = [];
      serialized.findings.info = [];
    }
    return JSON.stringify(serialized, null, 2);
  }
}
