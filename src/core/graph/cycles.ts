/**
 * Elementary cycle search over a small directed graph.
 *
 * For each start node (in sorted order) a DFS with a recursion stack walks
 * only nodes ordered after the start that can reach it again. An edge back
 * to the start closes a cycle, so every elementary cycle is found exactly
 * once, rooted at its smallest member. Nodes that failed to reach the start
 * stay blocked until a node they lead to is unblocked (Johnson), and the
 * total number of edge visits is capped. The result does not depend on the
 * order nodes or edges were declared in.
 */

export interface CycleSearchResult {
  /** Each cycle starts at its smallest member; closing edge implied */
  cycles: string[][];
  truncated: boolean;
}

export function cycleKey(members: readonly string[]): string {
  return [...new Set(members)].sort().join('\u0000');
}

/**
 * Nodes ranked at or after `start` that can reach `start`.
 */
function nodesReaching(
  start: string,
  reverse: Map<string, string[]>,
  rank: Map<string, number>
): Set<string> {
  const startRank = rank.get(start) ?? 0;
  const reach = new Set<string>([start]);
  const queue = [start];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const prev of reverse.get(current) ?? []) {
      if ((rank.get(prev) ?? -1) >= startRank && !reach.has(prev)) {
        reach.add(prev);
        queue.push(prev);
      }
    }
  }
  return reach;
}

/** Edge visits allowed per search before it gives up and reports truncation */
export const DEFAULT_MAX_SEARCH_STEPS = 200_000;

export function findCycles(
  nodes: Iterable<string>,
  adjacency: ReadonlyMap<string, readonly string[]>,
  maxCycles: number,
  maxSteps: number = DEFAULT_MAX_SEARCH_STEPS
): CycleSearchResult {
  const order = [...new Set(nodes)].sort();
  const rank = new Map(order.map((name, i) => [name, i]));

  const sortedAdjacency = new Map<string, string[]>();
  const reverse = new Map<string, string[]>();
  for (const name of order) {
    const targets = [...new Set(adjacency.get(name) ?? [])].filter((t) => rank.has(t)).sort();
    sortedAdjacency.set(name, targets);
    for (const target of targets) {
      const list = reverse.get(target) ?? [];
      list.push(name);
      reverse.set(target, list);
    }
  }

  const cycles: string[][] = [];
  const seen = new Set<string>();
  let truncated = false;
  let steps = 0;

  for (const start of order) {
    if (truncated) break;
    const allowed = nodesReaching(start, reverse, rank);
    if (allowed.size === 1 && !(sortedAdjacency.get(start) ?? []).includes(start)) {
      continue;
    }

    const stack: string[] = [];
    // A blocked node cannot reach `start` without crossing the current stack
    const blocked = new Set<string>();
    const blockedBy = new Map<string, Set<string>>();

    const unblock = (node: string): void => {
      blocked.delete(node);
      const waiting = blockedBy.get(node);
      if (waiting === undefined) return;
      blockedBy.delete(node);
      for (const other of waiting) {
        if (blocked.has(other)) unblock(other);
      }
    };

    const circuit = (node: string): boolean => {
      let found = false;
      const targets = (sortedAdjacency.get(node) ?? []).filter((next) => allowed.has(next));
      stack.push(node);
      blocked.add(node);

      for (const next of targets) {
        if (truncated) break;
        if (++steps > maxSteps) {
          truncated = true;
          break;
        }
        if (next === start) {
          found = true;
          const key = cycleKey(stack);
          if (!seen.has(key)) {
            if (cycles.length >= maxCycles) {
              truncated = true;
              break;
            }
            seen.add(key);
            cycles.push([...stack]);
          }
        } else if (!blocked.has(next) && circuit(next)) {
          found = true;
        }
      }

      if (found) {
        unblock(node);
      } else {
        for (const next of targets) {
          const waiting = blockedBy.get(next) ?? new Set<string>();
          waiting.add(node);
          blockedBy.set(next, waiting);
        }
      }
      stack.pop();
      return found;
    };

    circuit(start);
  }

  return { cycles, truncated };
}
