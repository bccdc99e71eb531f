import { Command } from 'commander';
import chalk from 'chalk';
import type { GraphFormat } from '../../core/graph/types.js';
import { logger as log } from '../../utils/logger.js';
import { loadEcosystemGraph } from './ecosystem-helpers.js';
import { parseInteger } from './options.js';

interface GraphCommandOptions {
  config?: string;
  overrides?: string;
  format: string;
  centralThreshold?: number;
}

const VALID_FORMATS: GraphFormat[] = ['mermaid', 'graphviz', 'json'];

function isGraphFormat(value: string): value is GraphFormat {
  return VALID_FORMATS.some((format) => format === value);
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Print the dependency graph with reverse-dependency counts and depth')
    .argument('[index]', 'Ecosystem index file (JSON or YAML)', 'ecosystem-index.json')
    .option('-c, --config <path>', 'Path to config file')
    .option('--overrides <dir>', 'Directory of <repo>/metadata.yml overrides')
    .option('-f, --format <format>', 'Output format (mermaid, graphviz, json)', 'mermaid')
    .option('--central-threshold <n>', 'Reverse-dependency count marking a central node', (v) =>
      parseInteger(v, '--central-threshold')
    )
    .action(async (indexPath: string, options: GraphCommandOptions) => {
      try {
        await runGraph(indexPath, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runGraph(indexPath: string, options: GraphCommandOptions): Promise<void> {
  const format = options.format;
  if (!isGraphFormat(format)) {
    throw new Error(`Invalid format: ${format}. Use: ${VALID_FORMATS.join(', ')}`);
  }

  const { builder, graph } = await loadEcosystemGraph(indexPath, options);

  if (graph.nodes.length === 0) {
    log.warn('No repositories found in index');
    return;
  }

  // Diagram text goes to stdout untouched so it can be piped into a file
  console.log(builder.format(graph, format));

  if (format !== 'json') {
    const central = graph.nodes.filter((n) => n.central).length;
    console.error(chalk.dim('─'.repeat(50)));
    console.error(
      chalk.dim(`Repositories: ${graph.nodes.length}, Edges: ${graph.edges.length}, Central: ${central}`)
    );
    if (graph.directCycles.length > 0) {
      console.error(chalk.yellow(`Direct cycles: ${graph.directCycles.length} (run 'ecoaudit audit' for details)`));
    }
  }
}
