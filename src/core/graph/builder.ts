import { LAYERS, type EdgeType, type RepositoryRecord } from '../metadata/types.js';
import { logger } from '../../utils/logger.js';
import { cycleKey, findCycles } from './cycles.js';
import type {
  DependencyCycle,
  DependencyEdge,
  EcosystemGraph,
  GraphFormat,
  GraphNode,
  GraphOptions,
  LayerSummary,
  UnresolvedDependency,
} from './types.js';

const log = logger.child('graph');

const DEFAULT_OPTIONS: Required<GraphOptions> = {
  centralThreshold: 3,
  maxCycles: 100,
};

const UNASSIGNED_LAYER = 'unassigned';

const EDGE_ORDER: Record<EdgeType, number> = { direct: 0, conceptual: 1, test: 2, example: 3 };

function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
  if (a.from !== b.from) return a.from < b.from ? -1 : 1;
  if (a.to !== b.to) return a.to < b.to ? -1 : 1;
  return EDGE_ORDER[a.type] - EDGE_ORDER[b.type];
}

/**
 * Builds the ecosystem dependency graph from loaded repository records.
 */
export class GraphBuilder {
  private records: ReadonlyMap<string, RepositoryRecord>;
  private options: Required<GraphOptions>;

  constructor(records: ReadonlyMap<string, RepositoryRecord>, options: GraphOptions = {}) {
    this.records = records;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Build the graph. Unresolved dependency names are recorded, never turned into edges.
   */
  build(): EcosystemGraph {
    const edges: DependencyEdge[] = [];
    const unresolved: UnresolvedDependency[] = [];
    const edgeKeys = new Set<string>();

    for (const record of this.records.values()) {
      for (const dep of record.dependencies) {
        if (!this.records.has(dep.name)) {
          unresolved.push({ from: record.name, dependency: dep.name, type: dep.type });
          continue;
        }
        const key = `${record.name}\u0000${dep.name}\u0000${dep.type}`;
        if (edgeKeys.has(key)) continue;
        edgeKeys.add(key);
        edges.push({ from: record.name, to: dep.name, type: dep.type });
      }
    }
    edges.sort(compareEdges);

    const names = [...this.records.keys()].sort();
    const directAdjacency = this.adjacency(edges.filter((e) => e.type === 'direct'));
    const allAdjacency = this.adjacency(edges);

    const direct = findCycles(names, directAdjacency, this.options.maxCycles);
    const directKeys = new Set(direct.cycles.map((c) => cycleKey(c)));
    const all = findCycles(names, allAdjacency, this.options.maxCycles + directKeys.size);
    const directCycles = direct.cycles.map((path) => this.describeCycle(path, edges));
    // A mixed cycle has at least one hop with no direct edge
    const mixedCycles = all.cycles
      .filter((c) => !directKeys.has(cycleKey(c)))
      .map((path) => this.describeCycle(path, edges))
      .filter((c) => c.types.some((types) => !types.includes('direct')))
      .slice(0, this.options.maxCycles);

    const nodes = this.buildNodes(names, edges, directAdjacency, directCycles);

    log.debug(`Built graph with ${nodes.length} nodes and ${edges.length} edges`, {
      unresolved: unresolved.length,
      directCycles: directCycles.length,
      mixedCycles: mixedCycles.length,
    });

    return {
      records: this.records,
      nodes,
      edges,
      unresolved,
      directCycles,
      mixedCycles,
      cyclesTruncated: direct.truncated || all.truncated,
    };
  }

  /**
   * Format graph as string output.
   */
  format(graph: EcosystemGraph, format: GraphFormat): string {
    switch (format) {
      case 'mermaid':
        return this.formatMermaid(graph);
      case 'graphviz':
        return this.formatGraphviz(graph);
      case 'json':
        return JSON.stringify(this.toJson(graph), null, 2);
    }
  }

  /**
   * Repository counts per layer, in layer order. Records with an unknown
   * layer are grouped under "unassigned".
   */
  summarizeLayers(graph: EcosystemGraph): LayerSummary[] {
    const groups = new Map<string, string[]>();
    for (const layer of LAYERS) groups.set(layer, []);

    for (const node of graph.nodes) {
      const layer = this.layerOf(node);
      const list = groups.get(layer) ?? [];
      list.push(node.name);
      groups.set(layer, list);
    }

    return [...groups.entries()]
      .filter(([layer, repos]) => repos.length > 0 || layer !== UNASSIGNED_LAYER)
      .map(([layer, repos]) => ({ layer, count: repos.length, repos }));
  }

  private adjacency(edges: DependencyEdge[]): Map<string, string[]> {
    const map = new Map<string, string[]>();
    for (const edge of edges) {
      const list = map.get(edge.from) ?? [];
      list.push(edge.to);
      map.set(edge.from, list);
    }
    return map;
  }

  private describeCycle(path: string[], edges: DependencyEdge[]): DependencyCycle {
    const types = path.map((from, i) => {
      const to = path[(i + 1) % path.length];
      return edges.filter((e) => e.from === from && e.to === to).map((e) => e.type);
    });
    return { path, types };
  }

  private buildNodes(
    names: string[],
    edges: DependencyEdge[],
    directAdjacency: Map<string, string[]>,
    directCycles: DependencyCycle[]
  ): GraphNode[] {
    const dependents = new Map<string, Set<string>>();
    const inCounts = new Map<string, number>();
    for (const edge of edges) {
      inCounts.set(edge.to, (inCounts.get(edge.to) ?? 0) + 1);
      const set = dependents.get(edge.to) ?? new Set<string>();
      set.add(edge.from);
      dependents.set(edge.to, set);
    }

    const inCycle = new Set(directCycles.flatMap((c) => c.path));
    const depths = this.computeDepths(names, directAdjacency);

    return names.map((name) => {
      const record = this.records.get(name);
      const count = inCounts.get(name) ?? 0;
      return {
        name,
        layer: record?.layer,
        status: record?.status,
        deprecated: record?.deprecated ?? false,
        reverseDependencyCount: count,
        dependents: [...(dependents.get(name) ?? [])].sort(),
        depth: depths.get(name) ?? null,
        central: count >= this.options.centralThreshold,
        inDirectCycle: inCycle.has(name),
      };
    });
  }

  /**
   * Longest direct-dependency chain per node. A node reached again while
   * still being visited sits on a cycle, so it and everything above it
   * has no depth.
   */
  private computeDepths(names: string[], directAdjacency: Map<string, string[]>): Map<string, number | null> {
    const depths = new Map<string, number | null>();
    const visiting = new Set<string>();

    const visit = (name: string): number | null => {
      const known = depths.get(name);
      if (known !== undefined) return known;
      if (visiting.has(name)) return null;

      visiting.add(name);
      let depth: number | null = 0;
      for (const dep of directAdjacency.get(name) ?? []) {
        const child = visit(dep);
        if (child === null) {
          depth = null;
        } else if (depth !== null) {
          depth = Math.max(depth, child + 1);
        }
      }
      visiting.delete(name);
      depths.set(name, depth);
      return depth;
    };

    for (const name of names) visit(name);
    return depths;
  }

  private layerOf(node: GraphNode): string {
    return LAYERS.some((layer) => layer === node.layer) && node.layer ? node.layer : UNASSIGNED_LAYER;
  }

  private toJson(graph: EcosystemGraph): Record<string, unknown> {
    return {
      nodes: graph.nodes.map((n) => ({
        name: n.name,
        layer: n.layer ?? null,
        status: n.status ?? null,
        reverse_dependency_count: n.reverseDependencyCount,
        dependents: n.dependents,
        depth: n.depth,
        central: n.central,
        in_direct_cycle: n.inDirectCycle,
      })),
      edges: graph.edges,
      layers: this.summarizeLayers(graph),
      cycles: {
        direct: graph.directCycles.map((c) => c.path),
        mixed: graph.mixedCycles.map((c) => c.path),
        truncated: graph.cyclesTruncated,
      },
    };
  }

  /**
   * Format graph as a Mermaid diagram with one subgraph per layer.
   */
  private formatMermaid(graph: EcosystemGraph): string {
    const lines: string[] = ['graph TB'];

    for (const summary of this.summarizeLayers(graph)) {
      if (summary.count === 0) continue;
      lines.push(`    subgraph ${summary.layer.toUpperCase()}`);
      for (const name of summary.repos) {
        lines.push(`        ${this.sanitizeId(name)}[${name}]`);
      }
      lines.push('    end');
    }

    for (const edge of graph.edges) {
      const from = this.sanitizeId(edge.from);
      const to = this.sanitizeId(edge.to);
      if (edge.type === 'direct') {
        lines.push(`    ${from} --> ${to}`);
      } else {
        lines.push(`    ${from} -.->|${edge.type}| ${to}`);
      }
    }

    const central = graph.nodes.filter((n) => n.central).map((n) => this.sanitizeId(n.name));
    if (central.length > 0) {
      lines.push('');
      lines.push('    classDef central stroke-width:3px');
      lines.push(`    class ${central.join(',')} central`);
    }

    return lines.join('\n');
  }

  /**
   * Format graph as Graphviz DOT.
   */
  private formatGraphviz(graph: EcosystemGraph): string {
    const lines: string[] = [
      'digraph Ecosystem {',
      '    rankdir=TB;',
      '    node [shape=box, style=filled, fillcolor="#f3f4f6"];',
      '',
    ];

    for (const node of graph.nodes) {
      const id = this.sanitizeId(node.name);
      let label = node.name;
      if (node.reverseDependencyCount > 0) {
        label += `\\n(${node.reverseDependencyCount} dependents)`;
      }
      const width = node.central ? ', penwidth=3' : '';
      lines.push(`    ${id} [label="${label}"${width}];`);
    }

    lines.push('');

    for (const edge of graph.edges) {
      const style = edge.type === 'direct' ? '' : ` [style=dashed, label="${edge.type}"]`;
      lines.push(`    ${this.sanitizeId(edge.from)} -> ${this.sanitizeId(edge.to)}${style};`);
    }

    lines.push('}');
    return lines.join('\n');
  }

  /**
   * Sanitize a repository name for use as a Mermaid/Graphviz identifier.
   */
  private sanitizeId(id: string): string {
    return id.replace(/[^A-Za-z0-9_]/g, '_');
  }
}
