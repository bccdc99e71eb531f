/**
 * Formatter type definitions.
 */
import type { Report } from '../../core/report/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Show remediation hints */
  verbose: boolean;
  /** Only show blocking findings */
  errorsOnly: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatReport(report: Report): string;
}
