/**
 * Options and loading shared by every stack command.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { loadStack } from '../core/stack/loader.js';
import type { Stack } from '../core/stack/types.js';
import { validateParallelism } from '../core/execution/scheduler.js';
import { ConfigError, ErrorCodes } from '../utils/errors.js';
import { isLogLevel, logger } from '../utils/logger.js';

export interface SharedOptions {
  stack?: string;
  config?: string;
  filter: string[];
  parallelism?: string;
  outDir?: string;
  ignoreErrors?: boolean;
  logLevel?: string;
}

export interface CommandContext {
  cwd: string;
  config: Config;
  stack: Stack;
  /** Absolute directory receiving generated units and stored outputs */
  outputDir: string;
  parallelism: number;
  ignoreErrors: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Attach the flags every stack command accepts.
 */
export function addSharedOptions(command: Command): Command {
  return command
    .option('-s, --stack <file>', 'Stack definition file (default: stack_file from config)')
    .option('-c, --config <path>', 'Path to config file', '.stackweave/config.yaml')
    .option('--filter <expr>', 'Unit filter; repeat to combine', collect, [])
    .option('-p, --parallelism <n>', 'Maximum units running at once')
    .option('-o, --out-dir <dir>', 'Directory for generated units, relative to the stack file')
    .option('--ignore-errors', 'Keep running units whose dependencies failed')
    .option('--log-level <level>', 'Log level (debug, info, warn, error, silent)');
}

export function parseParallelism(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return validateParallelism(fallback);
  }
  const trimmed = raw.trim();
  return validateParallelism(/^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN);
}

/**
 * Load tool settings, apply the log level and build the stack.
 */
export async function loadCommandContext(options: SharedOptions, cwd: string = process.cwd()): Promise<CommandContext> {
  const config = await loadConfig(cwd, options.config);

  const level = options.logLevel ?? config.logging.level;
  if (!isLogLevel(level)) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID, `Invalid log level '${level}'`, { level });
  }
  logger.setLevel(level);

  const stackFile = path.resolve(cwd, options.stack ?? config.stack_file);
  const stack = await loadStack(stackFile, config.hierarchy);
  logger.debug(`Loaded stack '${stack.name}' with ${stack.units.size} unit(s)`, { file: stackFile });

  return {
    cwd,
    config,
    stack,
    outputDir: path.resolve(stack.dir, options.outDir ?? config.execution.output_dir),
    parallelism: parseParallelism(options.parallelism, config.execution.parallelism),
    ignoreErrors: options.ignoreErrors ?? config.execution.ignore_errors,
  };
}

/**
 * Shared action wrapper: log the error and exit non-zero.
 */
export function handleCommandError(error: unknown): never {
  logger.error(error instanceof Error ? error.message : 'Unknown error');
  process.exit(1);
}
