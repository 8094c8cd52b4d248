/**
 * Runs unit actions through the OpenTofu/Terraform command line.
 *
 * Each unit gets a work directory `<workDir>/<unit path>`. The template is
 * copied in with `init -from-module` the first time (or when the source
 * changes), then inputs and backend are written as JSON beside it.
 * A unit that has started always runs to completion; cancellation is the
 * scheduler's business.
 */
import * as path from 'node:path';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { ensureDir, fileExists, globFiles, readFile, removePath, writeFile, writeJson } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { UnitAction } from '../actions.js';
import type { ExecutorSettings, StateSettings } from '../config/schema.js';
import type { Outputs } from '../dependencies/output-store.js';
import { formatSource } from '../source/parser.js';
import { backendDocument } from '../state/layout.js';
import type { Unit } from '../stack/types.js';
import { fromPlain, toPlainMap } from '../values/convert.js';
import type { UnitExecutionContext, UnitExecutionResult, UnitExecutor } from './types.js';

const execFileAsync = promisify(execFile);

export const TFVARS_FILE = 'terraform.tfvars.json';
export const BACKEND_FILE = 'backend.tf.json';
export const SOURCE_MARKER = '.stackweave-source';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

/**
 * Default runner on child_process.execFile.
 */
export const execFileRunner: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      encoding: 'utf-8',
      timeout: options.timeoutMs > 0 ? options.timeoutMs : undefined,
      maxBuffer: 64 * 1024 * 1024,
      env: { ...process.env, TF_IN_AUTOMATION: '1' },
    });
    return { stdout, stderr };
  } catch (error) {
    const stderr = hasStderr(error) ? error.stderr.trim() : '';
    const message = error instanceof Error ? error.message : String(error);
    throw new SystemError(
      ErrorCodes.COMMAND_FAILED,
      `${command} ${args.join(' ')} failed: ${stderr || message}`,
      { command, args, cwd: options.cwd }
    );
  }
};

function hasStderr(error: unknown): error is { stderr: string } {
  return typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string';
}

const ACTION_ARGS: Record<UnitAction, string[]> = {
  validate: ['validate'],
  plan: ['plan', '-input=false'],
  apply: ['apply', '-auto-approve', '-input=false'],
  destroy: ['destroy', '-auto-approve', '-input=false'],
  output: ['output', '-json'],
};

export interface CommandExecutorOptions {
  /** Root of the generated unit directories */
  workDir: string;
  settings: ExecutorSettings;
  state: StateSettings;
  runner?: CommandRunner;
}

/**
 * Parse `output -json`: `{ name: { value, type, sensitive } }`.
 */
export function parseOutputJson(stdout: string, unit: string): Outputs {
  let data: unknown;
  try {
    data = JSON.parse(stdout.trim() || '{}');
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Unit '${unit}' produced unreadable outputs: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { unit }
    );
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new SystemError(ErrorCodes.PARSE_ERROR, `Unit '${unit}' outputs must be a JSON object`, { unit });
  }

  const outputs: Outputs = {};
  const entries: Array<[string, unknown]> = Object.entries(data);
  for (const [name, entry] of entries) {
    const value = typeof entry === 'object' && entry !== null && 'value' in entry ? entry.value : entry;
    outputs[name] = fromPlain(value, `${unit}.outputs.${name}`);
  }
  return outputs;
}

export class CommandExecutor implements UnitExecutor {
  private readonly runner: CommandRunner;

  constructor(private readonly options: CommandExecutorOptions) {
    this.runner = options.runner ?? execFileRunner;
  }

  unitDir(unit: Unit): string {
    return path.join(this.options.workDir, unit.path);
  }

  /**
   * Source string handed to `init -from-module`; local paths are made absolute.
   */
  moduleSource(unit: Unit, stackDir: string): string {
    const source = unit.source;
    if (source.local) {
      return path.resolve(stackDir, source.location, source.subpath ?? '');
    }
    return formatSource(source);
  }

  async execute(context: UnitExecutionContext): Promise<UnitExecutionResult> {
    const { unit, action } = context;
    const dir = this.unitDir(unit);
    await ensureDir(dir);

    await this.fetchTemplate(context, dir);

    if (action !== 'output') {
      await writeJson(path.join(dir, TFVARS_FILE), toPlainMap(context.values));
    }
    await writeJson(path.join(dir, BACKEND_FILE), backendDocument(context.state, this.options.state));
    await this.run(context, dir, ['init', '-input=false']);

    const result = await this.run(context, dir, ACTION_ARGS[action]);
    if (action === 'output') {
      return { outputs: parseOutputJson(result.stdout, unit.name) };
    }
    if (action === 'apply') {
      const outputs = await this.run(context, dir, ['output', '-json']);
      return { outputs: parseOutputJson(outputs.stdout, unit.name) };
    }
    return {};
  }

  private async fetchTemplate(context: UnitExecutionContext, dir: string): Promise<void> {
    const marker = path.join(dir, SOURCE_MARKER);
    const source = this.moduleSource(context.unit, context.stackDir);
    if ((await fileExists(marker)) && (await readFile(marker)).trim() === source) {
      return;
    }

    // init -from-module refuses a directory that already holds configuration files.
    const stale = await globFiles(['*.tf', '*.tf.json', TFVARS_FILE], { cwd: dir, absolute: true });
    for (const file of stale) {
      await removePath(file);
    }
    logger.debug(`Fetching template for ${context.unit.name}`, { source });
    await this.run(context, dir, ['init', `-from-module=${source}`, '-input=false']);
    await writeFile(marker, `${source}\n`);
  }

  private async run(context: UnitExecutionContext, cwd: string, args: string[]): Promise<CommandResult> {
    logger.debug(`[${context.unit.name}] ${this.options.settings.binary} ${args.join(' ')}`);
    return this.runner(this.options.settings.binary, args, {
      cwd,
      timeoutMs: this.options.settings.timeout_ms,
    });
  }
}
