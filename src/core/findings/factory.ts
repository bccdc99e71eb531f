import type { Category, Finding, Severity } from './types.js';

export interface FindingInput {
  severity: Severity;
  category: Category;
  code: string;
  rule: string;
  subject: string;
  message: string;
  remediation?: string;
}

/**
 * Create an immutable finding. `remediation` is omitted when not given so
 * serialized output does not carry `undefined` keys.
 */
export function createFinding(input: FindingInput): Finding {
  const finding: Finding = input.remediation
    ? { ...input }
    : {
        severity: input.severity,
        category: input.category,
        code: input.code,
        rule: input.rule,
        subject: input.subject,
        message: input.message,
      };
  return Object.freeze(finding);
}
