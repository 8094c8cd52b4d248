export { ExecutionScheduler, validateParallelism, type SchedulerOptions } from './scheduler.js';
export {
  CommandExecutor,
  execFileRunner,
  parseOutputJson,
  TFVARS_FILE,
  BACKEND_FILE,
  SOURCE_MARKER,
  type CommandExecutorOptions,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from './executor.js';
export { InMemoryStateLockService, type StateLock, type StateLockService } from './state-lock.js';
export type {
  RunReport,
  UnitExecutionContext,
  UnitExecutionResult,
  UnitExecutor,
  UnitReport,
  UnitStatus,
} from './types.js';
