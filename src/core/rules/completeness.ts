/**
 * Required-field completeness. Missing fields, bad types and over-long
 * descriptions were already reported by the loader; this rule carries those
 * findings and adds the enumeration checks.
 */
import { FindingCodes, type Finding } from '../findings/types.js';
import { LAYERS, STATUSES, isLayer, isStatus } from '../metadata/types.js';
import { BaseRule } from './base.js';
import type { RuleContext } from './types.js';

export class CompletenessRule extends BaseRule {
  readonly id = 'completeness' as const;
  readonly category = 'metadata' as const;

  run(context: RuleContext): Finding[] {
    const findings: Finding[] = [...context.loadFindings];

    for (const record of context.graph.records.values()) {
      if (record.layer !== undefined && !isLayer(record.layer)) {
        findings.push(
          this.createFinding(
            'blocking',
            FindingCodes.INVALID_LAYER,
            record.name,
            `Invalid layer '${record.layer}'. Must be one of: ${LAYERS.join(', ')}`
          )
        );
      }

      if (record.status !== undefined && !isStatus(record.status)) {
        findings.push(
          this.createFinding(
            'blocking',
            FindingCodes.INVALID_STATUS,
            record.name,
            `Invalid status '${record.status}'. Must be one of: ${STATUSES.join(', ')}`
          )
        );
      }

      if (record.presentFields.includes('tags') && record.tags.length === 0) {
        findings.push(
          this.createFinding('warning', FindingCodes.EMPTY_TAGS, record.name, 'No tags declared', {
            remediation: 'Tag the repository with at least its layer',
          })
        );
      }
    }

    return findings;
  }
}
