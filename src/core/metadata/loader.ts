/**
 * Metadata loader: turns a parsed ecosystem index (plus optional
 * per-repository overrides) into repository records.
 *
 * Only structurally unusable input throws. Missing or ill-typed fields,
 * over-long descriptions, duplicates and unknown fields become findings.
 */
import { createFinding } from '../findings/factory.js';
import { FindingCodes, type Finding } from '../findings/types.js';
import { MalformedMetadataError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  DescriptorSchema,
  GENERATED_FIELDS,
  KNOWN_FIELDS,
  type DependencyEntry,
  type Descriptor,
} from './schema.js';
import {
  isEdgeType,
  type DeclaredDependency,
  type EcosystemInput,
  type IndexDeclarations,
  type LoadResult,
  type RepositoryRecord,
} from './types.js';
import { DEFAULT_REQUIRED_FIELDS } from '../config/schema.js';

const log = logger.child('loader');
const RULE_ID = 'loader';

type RawMap = Record<string, unknown>;

export interface LoaderOptions {
  requiredFields?: readonly string[];
  maxDescriptionLength?: number;
}

interface RawEntry {
  /** Human-readable location for error messages */
  location: string;
  /** Mapping key, when the index is a name→descriptor mapping */
  key?: string;
  raw: RawMap;
}

function isRawMap(value: unknown): value is RawMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Split the index document into raw descriptor entries.
 */
function extractEntries(index: unknown): { entries: RawEntry[]; declarations: IndexDeclarations } {
  if (Array.isArray(index)) {
    return { entries: entriesFromArray(index), declarations: {} };
  }
  if (!isRawMap(index)) {
    throw new MalformedMetadataError(
      ErrorCodes.INVALID_INDEX_SHAPE,
      'Ecosystem index must be a list of repositories or a mapping of name to descriptor',
      { field: 'repos' }
    );
  }

  if (!('repos' in index)) {
    return { entries: entriesFromMapping(index), declarations: {} };
  }

  const repos = index['repos'];
  const declarations = extractDeclarations(index);
  if (Array.isArray(repos)) {
    return { entries: entriesFromArray(repos), declarations };
  }
  if (isRawMap(repos)) {
    return { entries: entriesFromMapping(repos), declarations };
  }
  throw new MalformedMetadataError(
    ErrorCodes.INVALID_INDEX_SHAPE,
    "Index field 'repos' must be a list or a mapping",
    { field: 'repos' }
  );
}

function entriesFromArray(items: unknown[]): RawEntry[] {
  return items.map((item, i) => {
    const location = `repos[${i}]`;
    if (!isRawMap(item)) {
      throw new MalformedMetadataError(
        ErrorCodes.INVALID_RECORD,
        `Record ${location} is not an object`,
        { record: location }
      );
    }
    return { location, raw: item };
  });
}

function entriesFromMapping(map: RawMap): RawEntry[] {
  return Object.entries(map).map(([key, item]) => {
    const location = `repos.${key}`;
    if (!isRawMap(item)) {
      throw new MalformedMetadataError(
        ErrorCodes.INVALID_RECORD,
        `Record ${location} is not an object`,
        { record: location }
      );
    }
    return { location, key, raw: item };
  });
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function extractDeclarations(index: RawMap): IndexDeclarations {
  const declarations: IndexDeclarations = {};
  const version = index['version'];
  if (typeof version === 'string' || typeof version === 'number') {
    declarations.version = String(version);
  }
  const generated = index['generated'];
  if (typeof generated === 'string') {
    declarations.generated = generated;
  } else if (generated instanceof Date) {
    declarations.generated = generated.toISOString();
  }
  declarations.totalRepos = optionalNumber(index['total_repos']);
  declarations.publicRepos = optionalNumber(index['public_repos']);
  declarations.privateRepos = optionalNumber(index['private_repos']);
  return declarations;
}

/**
 * Resolve the record name, throwing when a list entry has none.
 */
function resolveName(entry: RawEntry): string {
  if (entry.key !== undefined) {
    return entry.key;
  }
  const name = entry.raw['name'];
  if (typeof name === 'string' && name.trim() !== '') {
    return name;
  }
  throw new MalformedMetadataError(
    ErrorCodes.MISSING_NAME,
    `Record ${entry.location} has no usable 'name' field`,
    { record: entry.location, field: 'name' }
  );
}

/**
 * Parse the known fields of a descriptor, dropping any that fail their schema.
 */
function parseDescriptor(name: string, raw: RawMap, findings: Finding[]): Descriptor {
  const candidate: RawMap = {};
  for (const [field, value] of Object.entries(raw)) {
    if (KNOWN_FIELDS.has(field) && value !== null && value !== undefined) {
      candidate[field] = value;
    }
  }

  // Each pass removes at least one offending field, so this terminates
  for (;;) {
    const result = DescriptorSchema.safeParse(candidate);
    if (result.success) {
      return result.data;
    }
    const badFields = new Set(
      result.error.issues.map((issue) => String(issue.path[0] ?? '')).filter((f) => f in candidate)
    );
    if (badFields.size === 0) {
      return {};
    }
    for (const field of [...badFields].sort()) {
      findings.push(
        createFinding({
          severity: 'blocking',
          category: 'metadata',
          code: FindingCodes.INVALID_FIELD_TYPE,
          rule: RULE_ID,
          subject: name,
          message: `Field '${field}' has an invalid value (${describeType(candidate[field])})`,
          remediation: `Fix the type of '${field}' in the repository descriptor`,
        })
      );
      delete candidate[field];
    }
  }
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) return 'list';
  if (value instanceof Date) return 'date';
  return typeof value;
}

function toDependencies(
  name: string,
  entries: DependencyEntry[] | undefined,
  findings: Finding[]
): DeclaredDependency[] {
  if (!entries) return [];
  return entries.map((entry) => {
    if (typeof entry === 'string') {
      return { name: entry, type: 'direct' };
    }
    const type = entry.type ?? 'direct';
    if (isEdgeType(type)) {
      return { name: entry.name, type };
    }
    findings.push(
      createFinding({
        severity: 'blocking',
        category: 'metadata',
        code: FindingCodes.INVALID_EDGE_TYPE,
        rule: RULE_ID,
        subject: name,
        message: `Dependency '${entry.name}' has unknown type '${type}'; treated as direct`,
        remediation: 'Use one of: direct, conceptual, test, example',
      })
    );
    return { name: entry.name, type: 'direct' };
  });
}

/**
 * Build a record from a merged descriptor, collecting per-record findings.
 */
function buildRecord(
  name: string,
  raw: RawMap,
  options: Required<LoaderOptions>,
  findings: Finding[]
): RepositoryRecord {
  const present = new Set<string>(['name']);
  for (const [field, value] of Object.entries(raw)) {
    if (value !== null && value !== undefined) {
      present.add(field);
    }
  }

  for (const field of options.requiredFields) {
    if (!present.has(field)) {
      findings.push(
        createFinding({
          severity: 'blocking',
          category: 'metadata',
          code: FindingCodes.MISSING_FIELD,
          rule: RULE_ID,
          subject: name,
          message: `Missing required field: ${field}`,
          remediation: `Add '${field}' to the repository descriptor`,
        })
      );
    }
  }

  for (const field of [...present].sort()) {
    if (!KNOWN_FIELDS.has(field) && !GENERATED_FIELDS.has(field)) {
      findings.push(
        createFinding({
          severity: 'info',
          category: 'metadata',
          code: FindingCodes.UNKNOWN_FIELD,
          rule: RULE_ID,
          subject: name,
          message: `Unknown field '${field}' ignored`,
        })
      );
    }
  }

  const descriptor = parseDescriptor(name, raw, findings);

  if (descriptor.short_description !== undefined) {
    const length = descriptor.short_description.trim().length;
    if (length > options.maxDescriptionLength) {
      findings.push(
        createFinding({
          severity: 'blocking',
          category: 'metadata',
          code: FindingCodes.DESCRIPTION_TOO_LONG,
          rule: RULE_ID,
          subject: name,
          message: `short_description exceeds ${options.maxDescriptionLength} chars (${length} chars)`,
          remediation: 'Move detail into long_description',
        })
      );
    }
  }

  return {
    name,
    layer: descriptor.layer,
    status: descriptor.status,
    shortDescription: descriptor.short_description,
    longDescription: descriptor.long_description,
    dependencies: toDependencies(name, descriptor.dependencies, findings),
    tags: descriptor.tags ?? [],
    license: descriptor.license,
    specVersion: descriptor.spec_version,
    url: descriptor.url,
    links: descriptor.links ?? [],
    healthEndpoint: descriptor.health_endpoint,
    updated: descriptor.updated,
    deprecated: descriptor.status === 'deprecated' || descriptor.deprecated === true,
    presentFields: [...present].sort(),
  };
}

/**
 * Load repository records from a parsed index and optional overrides.
 *
 * @throws MalformedMetadataError when the index or an override cannot be
 *   interpreted as repository descriptors at all
 */
export function loadEcosystem(input: EcosystemInput, options: LoaderOptions = {}): LoadResult {
  const resolved: Required<LoaderOptions> = {
    requiredFields: options.requiredFields ?? DEFAULT_REQUIRED_FIELDS,
    maxDescriptionLength: options.maxDescriptionLength ?? 150,
  };

  const { entries, declarations } = extractEntries(input.index);
  const overrides = input.overrides ?? {};
  for (const [key, value] of Object.entries(overrides)) {
    if (!isRawMap(value)) {
      throw new MalformedMetadataError(
        ErrorCodes.INVALID_RECORD,
        `Override for '${key}' is not an object`,
        { record: `overrides.${key}` }
      );
    }
  }

  const records = new Map<string, RepositoryRecord>();
  const findings: Finding[] = [];

  for (const entry of entries) {
    const name = resolveName(entry);

    if (entry.key !== undefined) {
      const declared = entry.raw['name'];
      if (declared !== undefined && declared !== null && declared !== entry.key) {
        findings.push(
          createFinding({
            severity: 'blocking',
            category: 'metadata',
            code: FindingCodes.NAME_MISMATCH,
            rule: RULE_ID,
            subject: name,
            message: `Declared name '${String(declared)}' does not match index key '${entry.key}'`,
          })
        );
      }
    }

    if (records.has(name)) {
      findings.push(
        createFinding({
          severity: 'blocking',
          category: 'metadata',
          code: FindingCodes.DUPLICATE_NAME,
          rule: RULE_ID,
          subject: name,
          message: `Duplicate repository name (${entry.location}); first occurrence kept`,
          remediation: 'Remove or rename the duplicate descriptor',
        })
      );
      continue;
    }

    const override = overrides[name];
    const merged: RawMap = isRawMap(override) ? { ...entry.raw, ...override, name } : { ...entry.raw, name };
    records.set(name, buildRecord(name, merged, resolved, findings));
  }

  for (const key of Object.keys(overrides)) {
    if (!records.has(key)) {
      findings.push(
        createFinding({
          severity: 'info',
          category: 'metadata',
          code: FindingCodes.UNKNOWN_OVERRIDE,
          rule: RULE_ID,
          subject: key,
          message: 'Metadata override for a repository not in the index ignored',
          remediation: 'Add the repository to the ecosystem index',
        })
      );
    }
  }

  log.debug(`Loaded ${records.size} repositories`, { findings: findings.length });
  return { records, declarations, findings };
}
