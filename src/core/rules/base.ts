import { createFinding } from '../findings/factory.js';
import type { Category, Finding, Severity } from '../findings/types.js';
import type { AuditRule, RuleContext, RuleId } from './types.js';

export interface FindingOptions {
  remediation?: string;
}

/**
 * Base class for audit rules.
 * Provides a finding helper bound to the rule's id and category.
 */
export abstract class BaseRule implements AuditRule {
  abstract readonly id: RuleId;
  abstract readonly category: Category;

  abstract run(context: RuleContext): Finding[] | Promise<Finding[]>;

  protected createFinding(
    severity: Severity,
    code: string,
    subject: string,
    message: string,
    options: FindingOptions = {}
  ): Finding {
    return createFinding({
      severity,
      category: this.category,
      code,
      rule: this.id,
      subject,
      message,
      remediation: options.remediation,
    });
  }
}
