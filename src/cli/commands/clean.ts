import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { cleanGenerated } from '../../core/generate/generator.js';
import { handleCommandError } from '../context.js';

interface CleanOptions {
  config: string;
  outDir?: string;
}

/**
 * Create the clean command. Needs no stack, only the output directory name.
 */
export function createCleanCommand(): Command {
  return new Command('clean')
    .description('Remove generated stack directories below the working directory')
    .option('-c, --config <path>', 'Path to config file', '.stackweave/config.yaml')
    .option('-o, --out-dir <dir>', 'Name of the generated directory')
    .action(async (options: CleanOptions) => {
      try {
        const cwd = process.cwd();
        const config = await loadConfig(cwd, options.config);
        const removed = await cleanGenerated(cwd, options.outDir ?? config.execution.output_dir);
        for (const dir of removed) {
          console.log(chalk.dim(`removed ${path.relative(cwd, dir)}`));
        }
        console.log(chalk.green(`Removed ${removed.length} director${removed.length === 1 ? 'y' : 'ies'}`));
      } catch (error) {
        handleCommandError(error);
      }
    });
}
