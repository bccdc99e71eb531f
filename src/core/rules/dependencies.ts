import { FindingCodes, type Finding } from '../findings/types.js';
import { BaseRule } from './base.js';
import type { RuleContext } from './types.js';

/**
 * Every declared dependency must name a repository in the index.
 */
export class DependencyValidityRule extends BaseRule {
  readonly id = 'dependencies' as const;
  readonly category = 'dependency' as const;

  run(context: RuleContext): Finding[] {
    const findings: Finding[] = [];
    const reported = new Set<string>();

    for (const missing of context.graph.unresolved) {
      const key = `${missing.from}\u0000${missing.dependency}`;
      if (reported.has(key)) continue;
      reported.add(key);

      findings.push(
        this.createFinding(
          'blocking',
          FindingCodes.UNRESOLVED_DEPENDENCY,
          missing.from,
          `Unresolved dependency: ${missing.dependency}`,
          { remediation: `Add '${missing.dependency}' to the ecosystem index or remove it from dependencies` }
        )
      );
    }

    return findings;
  }
}
