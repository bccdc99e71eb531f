import { FindingCodes, type Finding } from '../findings/types.js';
import type { DependencyCycle } from '../graph/types.js';
import { BaseRule } from './base.js';
import type { RuleContext } from './types.js';

function formatPath(cycle: DependencyCycle): string {
  return [...cycle.path, cycle.path[0]].join(' → ');
}

/**
 * Direct dependencies must not form a cycle. Cycles through conceptual,
 * test or example edges are legitimate enough to only warn about.
 */
export class CycleFreedomRule extends BaseRule {
  readonly id = 'cycles' as const;
  readonly category = 'dependency' as const;

  run(context: RuleContext): Finding[] {
    const { graph } = context;
    const findings: Finding[] = [];

    for (const cycle of graph.directCycles) {
      const deprecated = cycle.path.filter((name) => graph.records.get(name)?.deprecated);
      const message = deprecated.length > 0
        ? `Direct dependency cycle: ${formatPath(cycle)} (deprecated: ${deprecated.join(', ')})`
        : `Direct dependency cycle: ${formatPath(cycle)}`;

      findings.push(
        this.createFinding(
          deprecated.length > 0 ? 'warning' : 'blocking',
          FindingCodes.CYCLE_DETECTED,
          cycle.path[0],
          message,
          { remediation: this.fixHint(cycle) }
        )
      );
    }

    for (const cycle of graph.mixedCycles) {
      const types = [...new Set(cycle.types.flat().filter((t) => t !== 'direct'))].sort();
      findings.push(
        this.createFinding(
          'warning',
          FindingCodes.MIXED_CYCLE,
          cycle.path[0],
          `Dependency cycle through ${types.join('/')} edges: ${formatPath(cycle)}`
        )
      );
    }

    if (graph.cyclesTruncated) {
      findings.push(
        this.createFinding(
          'info',
          FindingCodes.CYCLE_DETECTED,
          'ecosystem',
          `Cycle search stopped before covering the graph (limit ${context.config.max_cycles} cycles); more may exist`
        )
      );
    }

    return findings;
  }

  private fixHint(cycle: DependencyCycle): string {
    if (cycle.path.length === 1) {
      return 'Remove the self-dependency';
    }
    if (cycle.path.length === 2) {
      return 'Remove one of the two direct dependencies between these repositories';
    }
    return 'Break the cycle by declaring one edge as conceptual or extracting the shared part';
  }
}
