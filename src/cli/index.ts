import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { UNIT_ACTIONS } from '../core/actions.js';
import { createRunCommand } from './commands/run.js';
import { createGenerateCommand } from './commands/generate.js';
import { createCleanCommand } from './commands/clean.js';
import { createGraphCommand } from './commands/graph.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const data: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof data === 'object' && data !== null && 'version' in data && typeof data.version === 'string') {
    return data.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('stackweave')
    .description('Compose hierarchical stack configuration and run units in dependency order')
    .version(readVersion());

  program.addCommand(createGenerateCommand());
  for (const action of UNIT_ACTIONS) {
    program.addCommand(createRunCommand(action));
  }
  program.addCommand(createCleanCommand());
  program.addCommand(createGraphCommand());
  return program;
}
