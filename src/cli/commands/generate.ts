import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { generateStack } from '../../core/generate/generator.js';
import { addSharedOptions, handleCommandError, loadCommandContext, type SharedOptions } from '../context.js';

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return addSharedOptions(new Command('generate').description('Expand the stack into unit directories'))
    .action(async (options: SharedOptions) => {
      try {
        const context = await loadCommandContext(options);
        const written = await generateStack(context.stack, context.outputDir);
        for (const file of written) {
          console.log(chalk.dim(path.relative(context.cwd, file)));
        }
        console.log(chalk.green(`Generated ${written.length} unit(s) for stack '${context.stack.name}'`));
      } catch (error) {
        handleCommandError(error);
      }
    });
}
