/**
 * Shared report fixtures for formatter tests.
 */
import { createFinding } from '../../../../src/core/findings/factory.js';
import { buildReport } from '../../../../src/core/report/builder.js';
import type { Report } from '../../../../src/core/report/types.js';

export function sampleReport(complete = true): Report {
  return buildReport(
    [
      createFinding({
        severity: 'blocking',
        category: 'dependency',
        code: 'D001',
        rule: 'dependencies',
        subject: 'alpha',
        message: 'Unresolved dependency: ghost',
        remediation: 'Add it',
      }),
      createFinding({
        severity: 'warning',
        category: 'metadata',
        code: 'M010',
        rule: 'completeness',
        subject: 'alpha',
        message: 'No tags declared',
      }),
      createFinding({
        severity: 'info',
        category: 'staleness',
        code: 'T002',
        rule: 'staleness',
        subject: 'beta',
        message: 'Not updated for 400 days',
      }),
    ],
    { complete }
  );
}
