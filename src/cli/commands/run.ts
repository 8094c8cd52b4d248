/**
 * validate / plan / apply / destroy / output.
 */
import { Command } from 'commander';
import type { UnitAction } from '../../core/actions.js';
import { FileOutputStore, type OutputStore } from '../../core/dependencies/output-store.js';
import { CommandExecutor } from '../../core/execution/executor.js';
import { ExecutionScheduler } from '../../core/execution/scheduler.js';
import type { StateLockService } from '../../core/execution/state-lock.js';
import type { RunReport, UnitExecutor } from '../../core/execution/types.js';
import { FilterEngine } from '../../core/filter/engine.js';
import type { ChangedFilesProvider } from '../../core/filter/types.js';
import { createExecutionPlan } from '../../core/plan/planner.js';
import { toPlainMap } from '../../core/values/convert.js';
import { logger } from '../../utils/logger.js';
import { formatRunSummary } from '../formatters/summary.js';
import { addSharedOptions, handleCommandError, loadCommandContext, type CommandContext, type SharedOptions } from '../context.js';

/**
 * Collaborators a run can be given instead of the defaults (file store,
 * command executor, git, in-memory locks).
 */
export interface RunOverrides {
  executor?: UnitExecutor;
  store?: OutputStore;
  locks?: StateLockService;
  changedFiles?: ChangedFilesProvider;
  signal?: AbortSignal;
}

export interface RunResult {
  report: RunReport;
  store: OutputStore;
}

/**
 * Filter, plan and execute one action over a loaded stack.
 */
export async function runAction(
  action: UnitAction,
  context: CommandContext,
  filters: readonly string[],
  overrides: RunOverrides = {}
): Promise<RunResult> {
  const { stack, config } = context;

  const selection = await new FilterEngine(stack, { changedFiles: overrides.changedFiles }).evaluate(filters);
  const plan = createExecutionPlan(stack, selection, action, config.execution.exclusion_policy);
  if (plan.entries.length === 0) {
    logger.warn('No units selected');
  }

  const store = overrides.store ?? new FileOutputStore(context.outputDir);
  const executor = overrides.executor ?? new CommandExecutor({
    workDir: context.outputDir,
    settings: config.executor,
    state: config.state,
  });

  const scheduler = new ExecutionScheduler(stack, {
    parallelism: context.parallelism,
    ignoreErrors: context.ignoreErrors,
    executor,
    store,
    state: config.state,
    locks: overrides.locks,
    signal: overrides.signal,
  });
  return { report: await scheduler.run(plan), store };
}

async function runFromCli(action: UnitAction, options: SharedOptions): Promise<void> {
  const context = await loadCommandContext(options);
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted: waiting for running units to finish');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let result: RunResult;
  try {
    result = await runAction(action, context, options.filter, { signal: controller.signal });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const { report, store } = result;
  if (action === 'output') {
    const collected: Record<string, unknown> = {};
    for (const unit of report.units) {
      if (unit.status !== 'succeeded') continue;
      const outputs = await store.get(unit.path);
      collected[unit.path] = outputs ? toPlainMap(outputs) : {};
    }
    console.log(JSON.stringify(collected, null, 2));
  }

  console.log();
  console.log(formatRunSummary(report));

  if (!report.ok || report.cancelled) {
    process.exit(1);
  }
}

const DESCRIPTIONS: Record<UnitAction, string> = {
  validate: 'Validate every selected unit',
  plan: 'Show planned changes for every selected unit',
  apply: 'Apply selected units in dependency order',
  destroy: 'Destroy selected units, dependents first',
  output: 'Print the outputs of selected units as JSON',
};

/**
 * Create a command running `action` across the stack.
 */
export function createRunCommand(action: UnitAction): Command {
  return addSharedOptions(new Command(action).description(DESCRIPTIONS[action]))
    .action(async (options: SharedOptions) => {
      try {
        await runFromCli(action, options);
      } catch (error) {
        handleCommandError(error);
      }
    });
}
