import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createAuditCommand } from './commands/audit.js';
import { createGraphCommand } from './commands/graph.js';
import { createSummaryCommand } from './commands/summary.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('ecoaudit')
    .description('Consistency auditor for a declared ecosystem of repositories')
    .version(readVersion());
  [createAuditCommand, createGraphCommand, createSummaryCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
