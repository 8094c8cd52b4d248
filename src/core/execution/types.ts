import type { UnitAction } from '../actions.js';
import type { Outputs } from '../dependencies/output-store.js';
import type { ResolvedDependency } from '../dependencies/resolver.js';
import type { StateLocation } from '../state/layout.js';
import type { Unit } from '../stack/types.js';
import type { ValueMap } from '../values/types.js';

export type UnitStatus = 'succeeded' | 'failed' | 'skipped' | 'cancelled' | 'not-selected';

/**
 * Everything an executor needs to run one unit.
 */
export interface UnitExecutionContext {
  unit: Unit;
  action: UnitAction;
  /** Values with dependency references substituted (unresolved for `output`) */
  values: ValueMap;
  dependencies: ResolvedDependency[];
  state: StateLocation;
  /** Directory of the stack definition; local sources resolve against it */
  stackDir: string;
}

export interface UnitExecutionResult {
  /** Outputs after apply/output; ignored for other actions */
  outputs?: Outputs;
}

/**
 * Runs a single unit action against the infrastructure engine.
 */
export interface UnitExecutor {
  execute(context: UnitExecutionContext): Promise<UnitExecutionResult>;
}

export interface UnitReport {
  unit: string;
  path: string;
  status: UnitStatus;
  error?: string;
  durationMs: number;
}

export interface RunReport {
  action: UnitAction;
  /** False when any unit failed */
  ok: boolean;
  cancelled: boolean;
  /** Planned units in completion order, then not-selected units */
  units: UnitReport[];
  warnings: string[];
  durationMs: number;
}
