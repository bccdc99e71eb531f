import type { EdgeType, RepositoryRecord } from '../metadata/types.js';

/**
 * Directed edge from a dependent repository to the one it depends on.
 */
export interface DependencyEdge {
  from: string;
  to: string;
  type: EdgeType;
}

/**
 * A declared dependency naming no known repository. Never becomes an edge.
 */
export interface UnresolvedDependency {
  from: string;
  dependency: string;
  type: EdgeType;
}

/**
 * An elementary cycle. `path` starts at the alphabetically smallest member
 * and follows edge direction; the closing edge back to `path[0]` is implied.
 */
export interface DependencyCycle {
  path: string[];
  /** Edge types along the path, `types[i]` being path[i] → path[i + 1] */
  types: EdgeType[][];
}

/**
 * Node in the ecosystem graph with computed attributes.
 */
export interface GraphNode {
  name: string;
  layer?: string;
  status?: string;
  deprecated: boolean;
  /** Number of edges (any type) targeting this node */
  reverseDependencyCount: number;
  /** Repositories depending on this one, sorted */
  dependents: string[];
  /** Longest chain of direct dependencies below this node; null in or above a direct cycle */
  depth: number | null;
  /** reverseDependencyCount reached the central threshold */
  central: boolean;
  inDirectCycle: boolean;
}

/**
 * Complete ecosystem graph for one audit run.
 */
export interface EcosystemGraph {
  records: ReadonlyMap<string, RepositoryRecord>;
  /** Sorted by name */
  nodes: GraphNode[];
  /** Sorted by from, to, type */
  edges: DependencyEdge[];
  unresolved: UnresolvedDependency[];
  /** Cycles among direct edges */
  directCycles: DependencyCycle[];
  /** Cycles needing at least one non-direct edge */
  mixedCycles: DependencyCycle[];
  /** Cycle search stopped at the cycle limit or its step budget */
  cyclesTruncated: boolean;
}

export type GraphFormat = 'mermaid' | 'graphviz' | 'json';

export interface GraphOptions {
  /** Reverse-dependency count at which a node is central (default 3) */
  centralThreshold?: number;
  /** Maximum cycles collected per edge class (default 100) */
  maxCycles?: number;
}

export interface LayerSummary {
  layer: string;
  count: number;
  repos: string[];
}
