/**
 * Repository metadata model.
 */
import type { Finding } from '../findings/types.js';

export const LAYERS = [
  'protocol',
  'language',
  'runtime',
  'application',
  'infrastructure',
  'research',
] as const;
export type Layer = (typeof LAYERS)[number];

export const STATUSES = ['alpha', 'beta', 'stable', 'deprecated'] as const;
export type RepositoryStatus = (typeof STATUSES)[number];

export const EDGE_TYPES = ['direct', 'conceptual', 'test', 'example'] as const;
export type EdgeType = (typeof EDGE_TYPES)[number];

export function isLayer(value: string): value is Layer {
  return LAYERS.some((item) => item === value);
}

export function isStatus(value: string): value is RepositoryStatus {
  return STATUSES.some((item) => item === value);
}

export function isEdgeType(value: string): value is EdgeType {
  return EDGE_TYPES.some((item) => item === value);
}

export interface DeclaredDependency {
  name: string;
  type: EdgeType;
}

/**
 * One repository in the ecosystem index.
 * Layer and status keep the declared value; enum membership is a rule concern.
 */
export interface RepositoryRecord {
  name: string;
  layer?: string;
  status?: string;
  shortDescription?: string;
  longDescription?: string;
  dependencies: DeclaredDependency[];
  tags: string[];
  license?: string;
  specVersion?: string;
  url?: string;
  /** Cross-links to other properties (docs, sites) */
  links: string[];
  healthEndpoint?: string;
  /** Last content or status change, YYYY-MM-DD */
  updated?: string;
  /** status is `deprecated` or the descriptor sets `deprecated: true` */
  deprecated: boolean;
  /** Descriptor fields present in the merged input */
  presentFields: string[];
}

/**
 * Statistics the index itself publishes.
 */
export interface IndexDeclarations {
  version?: string;
  generated?: string;
  totalRepos?: number;
  publicRepos?: number;
  privateRepos?: number;
}

export interface LoadResult {
  /** Records keyed by name, in input order */
  records: Map<string, RepositoryRecord>;
  declarations: IndexDeclarations;
  findings: Finding[];
}

/**
 * Raw inputs to a load: the parsed index document and optional
 * per-repository override blocks keyed by repository name.
 */
export interface EcosystemInput {
  index: unknown;
  overrides?: Record<string, unknown>;
}
