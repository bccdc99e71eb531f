import { FindingCodes, type Finding } from '../findings/types.js';
import { isLive, type ProbeOutcome } from '../probe/types.js';
import { BaseRule } from './base.js';
import type { RuleContext } from './types.js';
import type { EcosystemGraph } from '../graph/types.js';

/**
 * Referenced URLs mapped to the repositories referencing them, sorted.
 */
export function collectUrls(graph: EcosystemGraph): Map<string, string[]> {
  const refs = new Map<string, Set<string>>();
  for (const record of graph.records.values()) {
    const urls = [record.url, ...record.links, record.healthEndpoint];
    for (const url of urls) {
      if (url === undefined || url.trim() === '') continue;
      const set = refs.get(url) ?? new Set<string>();
      set.add(record.name);
      refs.set(url, set);
    }
  }
  return new Map([...refs.entries()].map(([url, names]) => [url, [...names].sort()]));
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function describeFailure(outcome: ProbeOutcome): string | null {
  switch (outcome.kind) {
    case 'status':
      return isLive(outcome) ? null : `HTTP ${outcome.status} after ${outcome.attempts} attempt(s)`;
    case 'timeout':
      return outcome.reason === 'budget'
        ? 'probe budget exhausted before a response'
        : `no response within the request timeout (attempt ${outcome.attempts})`;
    case 'connection-error':
      return `${outcome.message} after ${outcome.attempts} attempt(s)`;
    case 'invalid-url':
      return `invalid URL (${outcome.message})`;
    case 'cancelled':
      return null;
  }
}

/**
 * Every referenced URL must answer with a 2xx or 3xx status.
 */
export class LinkLivenessRule extends BaseRule {
  readonly id = 'links' as const;
  readonly category = 'link' as const;

  async run(context: RuleContext): Promise<Finding[]> {
    const refs = collectUrls(context.graph);
    if (refs.size === 0) return [];

    const bestEffort = new Set(context.config.best_effort_hosts.map((host) => host.toLowerCase()));
    const outcomes = await context.prober.probe(refs.keys(), context.signal);
    const findings: Finding[] = [];

    for (const [url, outcome] of outcomes) {
      const failure = describeFailure(outcome);
      if (failure === null) continue;

      const host = hostOf(url);
      const severity = host !== null && bestEffort.has(host) ? 'warning' : 'blocking';
      const code = outcome.kind === 'timeout' ? FindingCodes.PROBE_TIMEOUT : FindingCodes.DEAD_LINK;
      const referencedBy = (refs.get(url) ?? []).join(', ');

      findings.push(
        this.createFinding(severity, code, url, `Link ${failure}; referenced by ${referencedBy}`, {
          remediation: 'Fix or remove the link, or mark its host as best-effort',
        })
      );
    }

    return findings;
  }
}
