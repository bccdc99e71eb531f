/**
 * Shared loading for commands that work on the graph without auditing it.
 */
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { GraphBuilder } from '../../core/graph/builder.js';
import type { EcosystemGraph } from '../../core/graph/types.js';
import { loadEcosystem } from '../../core/metadata/loader.js';
import { readIndexFile, readOverridesDir } from '../../core/metadata/reader.js';
import type { LoadResult } from '../../core/metadata/types.js';

export interface EcosystemSourceOptions {
  config?: string;
  overrides?: string;
  centralThreshold?: number;
}

export interface LoadedEcosystem {
  config: Config;
  load: LoadResult;
  builder: GraphBuilder;
  graph: EcosystemGraph;
}

export async function loadEcosystemGraph(
  indexPath: string,
  options: EcosystemSourceOptions
): Promise<LoadedEcosystem> {
  const config = await loadConfig(process.cwd(), options.config);
  const index = await readIndexFile(indexPath);
  const overrides = options.overrides ? await readOverridesDir(options.overrides) : undefined;

  const load = loadEcosystem(
    { index, overrides },
    { requiredFields: config.required_fields, maxDescriptionLength: config.max_description_length }
  );
  const builder = new GraphBuilder(load.records, {
    centralThreshold: options.centralThreshold ?? config.central_threshold,
    maxCycles: config.max_cycles,
  });

  return { config, load, builder, graph: builder.build() };
}

/**
 * Required fields each repository lacks, omitting repositories lacking none.
 */
export function missingFields(load: LoadResult, required: readonly string[]): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const record of load.records.values()) {
    const missing = required.filter((field) => !record.presentFields.includes(field));
    if (missing.length > 0) {
      result.set(record.name, missing);
    }
  }
  return result;
}
