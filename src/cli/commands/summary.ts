import { Command } from 'commander';
import chalk from 'chalk';
import { logger as log } from '../../utils/logger.js';
import { loadEcosystemGraph, missingFields } from './ecosystem-helpers.js';

interface SummaryCommandOptions {
  config?: string;
  overrides?: string;
  json?: boolean;
}

/**
 * Create the summary command.
 */
export function createSummaryCommand(): Command {
  return new Command('summary')
    .description('Show repositories per layer and which metadata fields are missing')
    .argument('[index]', 'Ecosystem index file (JSON or YAML)', 'ecosystem-index.json')
    .option('-c, --config <path>', 'Path to config file')
    .option('--overrides <dir>', 'Directory of <repo>/metadata.yml overrides')
    .option('--json', 'Output as JSON')
    .action(async (indexPath: string, options: SummaryCommandOptions) => {
      try {
        await runSummary(indexPath, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runSummary(indexPath: string, options: SummaryCommandOptions): Promise<void> {
  const { config, load, builder, graph } = await loadEcosystemGraph(indexPath, options);
  const layers = builder.summarizeLayers(graph);
  const missing = missingFields(load, config.required_fields);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          total: graph.nodes.length,
          layers,
          missing_fields: Object.fromEntries(missing),
        },
        null,
        2
      )
    );
    return;
  }

  console.log();
  console.log(chalk.bold(`Ecosystem Summary (${graph.nodes.length} repositories)`));
  console.log(chalk.dim('─'.repeat(50)));

  for (const layer of layers) {
    const count = layer.count === 0 ? chalk.dim('0') : String(layer.count);
    console.log(`  ${layer.layer.padEnd(16)} ${count}`);
  }

  console.log();
  if (missing.size === 0) {
    console.log(chalk.green('✓ All repositories declare the required fields'));
    return;
  }

  console.log(chalk.yellow(`Missing metadata (${missing.size} repositories):`));
  for (const [name, fields] of missing) {
    console.log(`  ${name}: ${chalk.dim(fields.join(', '))}`);
  }
}
