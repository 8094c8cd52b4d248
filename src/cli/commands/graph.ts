import { Command } from 'commander';
import chalk from 'chalk';
import { GraphFormatter } from '../../core/graph/formatter.js';
import type { GraphFormat } from '../../core/graph/types.js';
import { handleCommandError, loadCommandContext } from '../context.js';

interface GraphOptions {
  stack?: string;
  config?: string;
  format: string;
  logLevel?: string;
}

const GRAPH_FORMATS: readonly GraphFormat[] = ['mermaid', 'graphviz', 'json'];

function isGraphFormat(value: string): value is GraphFormat {
  return GRAPH_FORMATS.some((format) => format === value);
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Render the unit dependency graph')
    .option('-s, --stack <file>', 'Stack definition file (default: stack_file from config)')
    .option('-c, --config <path>', 'Path to config file', '.stackweave/config.yaml')
    .option('-f, --format <format>', 'Output format (mermaid, graphviz, json)', 'mermaid')
    .option('--log-level <level>', 'Log level (debug, info, warn, error, silent)')
    .action(async (options: GraphOptions) => {
      try {
        await runGraph(options);
      } catch (error) {
        handleCommandError(error);
      }
    });
}

async function runGraph(options: GraphOptions): Promise<void> {
  if (!isGraphFormat(options.format)) {
    throw new Error(`Invalid format: ${options.format}. Use: ${GRAPH_FORMATS.join(', ')}`);
  }
  const format = options.format;

  const { stack } = await loadCommandContext({ ...options, filter: [] });
  const paths = new Map([...stack.units.values()].map((unit) => [unit.name, unit.path]));
  const output = new GraphFormatter(stack.graph, paths).format(format);

  if (format === 'json') {
    console.log(output);
    return;
  }

  console.log();
  console.log(chalk.bold(`Stack '${stack.name}' (${format})`));
  console.log(chalk.dim('─'.repeat(50)));
  console.log();
  console.log(output);
  console.log();
  console.log(chalk.dim('─'.repeat(50)));
  console.log(chalk.dim(`Units: ${stack.graph.size}, Edges: ${stack.graph.edges().length}`));
}
