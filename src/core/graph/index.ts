export { GraphBuilder } from './builder.js';
export { findCycles, cycleKey, type CycleSearchResult } from './cycles.js';
export type {
  EcosystemGraph,
  GraphNode,
  DependencyEdge,
  DependencyCycle,
  UnresolvedDependency,
  GraphFormat,
  GraphOptions,
  LayerSummary,
} from './types.js';
