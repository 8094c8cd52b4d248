/**
 * Bounded-parallel execution of a plan over the unit DAG.
 *
 * A unit waits for every in-plan unit it depends on over an enabled edge
 * (for destroy: every in-plan unit depending on it). When a unit fails, its
 * transitive waiters are skipped unless ignoreErrors is set; independent
 * branches keep running. Aborting stops new launches and marks units that
 * never started as cancelled. State locations are computed for every planned
 * unit before anything runs, so a bad bucket template fails the whole run.
 */
import * as os from 'node:os';
import { ExecutionError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { StateSettings } from '../config/schema.js';
import { DependencyResolver, type ResolvedUnit } from '../dependencies/resolver.js';
import type { OutputStore } from '../dependencies/output-store.js';
import type { ExecutionPlan } from '../plan/planner.js';
import { computeStateLocation, lockId, type StateLocation } from '../state/layout.js';
import type { Stack } from '../stack/types.js';
import { InMemoryStateLockService, type StateLock, type StateLockService } from './state-lock.js';
import type { RunReport, UnitExecutor, UnitReport, UnitStatus } from './types.js';

export interface SchedulerOptions {
  parallelism: number;
  executor: UnitExecutor;
  store: OutputStore;
  state: StateSettings;
  ignoreErrors?: boolean;
  signal?: AbortSignal;
  locks?: StateLockService;
  /** Lock holder identity */
  holder?: string;
}

type Terminal = Exclude<UnitStatus, 'not-selected'>;

export function validateParallelism(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ExecutionError(
      ErrorCodes.INVALID_PARALLELISM,
      `Parallelism must be a positive integer, got ${value}`,
      { parallelism: value }
    );
  }
  return value;
}

export class ExecutionScheduler {
  private readonly resolver: DependencyResolver;
  private readonly locks: StateLockService;
  private readonly holder: string;
  private readonly parallelism: number;

  constructor(
    private readonly stack: Stack,
    private readonly options: SchedulerOptions
  ) {
    this.parallelism = validateParallelism(options.parallelism);
    this.resolver = new DependencyResolver(stack, options.store);
    this.locks = options.locks ?? new InMemoryStateLockService();
    this.holder = options.holder ?? `${os.hostname()}:${process.pid}`;
  }

  async run(plan: ExecutionPlan): Promise<RunReport> {
    const started = Date.now();
    const planned = plan.entries.map((e) => e.unit);
    const inPlan = new Set(planned);
    const destroying = plan.action === 'destroy';

    const locations = new Map<string, StateLocation>();
    for (const name of planned) {
      locations.set(name, computeStateLocation(this.pathOf(name), this.options.state, this.stack.config));
    }

    const waitsOn = new Map<string, string[]>();
    for (const name of planned) {
      const related = destroying
        ? this.stack.graph.dependentsOf(name)
        : this.stack.graph.dependenciesOf(name);
      waitsOn.set(name, related.filter((other) => inPlan.has(other)));
    }

    const status = new Map<string, Terminal>();
    const reports: UnitReport[] = [];
    const pending = [...planned];
    const running = new Map<string, Promise<void>>();

    const finish = (report: UnitReport & { status: Terminal }) => {
      status.set(report.unit, report.status);
      reports.push(report);
    };

    const launch = (name: string, state: StateLocation) => {
      const task = this.runUnit(name, plan, state).then((report) => {
        finish(report);
        running.delete(name);
      });
      running.set(name, task);
    };

    while (pending.length > 0 || running.size > 0) {
      if (this.options.signal?.aborted) {
        for (const name of pending.splice(0)) {
          finish({ unit: name, path: this.pathOf(name), status: 'cancelled', durationMs: 0 });
        }
      }

      let progressed = false;
      for (let i = 0; i < pending.length && running.size < this.parallelism; ) {
        const name = pending[i];
        const waits = waitsOn.get(name) ?? [];
        if (!waits.every((other) => status.has(other))) {
          i++;
          continue;
        }

        const blocker = waits.find((other) => status.get(other) !== 'succeeded');
        pending.splice(i, 1);
        progressed = true;
        if (blocker !== undefined && !this.options.ignoreErrors) {
          const reason = `${destroying ? 'dependent' : 'dependency'} '${blocker}' ${status.get(blocker)}`;
          logger.warn(`Skipping ${name}: ${reason}`);
          finish({ unit: name, path: this.pathOf(name), status: 'skipped', error: reason, durationMs: 0 });
          continue;
        }
        const state = locations.get(name);
        if (!state) {
          throw new ExecutionError(ErrorCodes.UNIT_FAILED, `No state location for unit '${name}'`, { unit: name });
        }
        launch(name, state);
      }

      if (running.size > 0) {
        await Promise.race(running.values());
      } else if (!progressed && pending.length > 0) {
        throw new ExecutionError(
          ErrorCodes.UNIT_FAILED,
          `Scheduler stalled with ${pending.length} unit(s) waiting: ${pending.join(', ')}`,
          { pending }
        );
      }
    }

    for (const name of plan.notSelected) {
      reports.push({ unit: name, path: this.pathOf(name), status: 'not-selected', durationMs: 0 });
    }

    return {
      action: plan.action,
      ok: ![...status.values()].includes('failed'),
      cancelled: this.options.signal?.aborted ?? false,
      units: reports,
      warnings: plan.warnings,
      durationMs: Date.now() - started,
    };
  }

  private async runUnit(
    name: string,
    plan: ExecutionPlan,
    state: StateLocation
  ): Promise<UnitReport & { status: Terminal }> {
    const started = Date.now();
    const unitPath = this.pathOf(name);
    let lock: StateLock | undefined;

    try {
      lock = await this.locks.acquire(lockId(state), this.holder);

      const resolved = await this.resolve(name, plan);
      logger.info(`${plan.action} ${name}`);
      const result = await this.options.executor.execute({
        unit: resolved.unit,
        action: plan.action,
        values: resolved.values,
        dependencies: resolved.dependencies,
        state,
        stackDir: this.stack.dir,
      });

      if ((plan.action === 'apply' || plan.action === 'output') && result.outputs) {
        await this.options.store.set(unitPath, result.outputs);
      } else if (plan.action === 'destroy') {
        await this.options.store.delete(unitPath);
      }

      logger.success(`${plan.action} ${name}`);
      return { unit: name, path: unitPath, status: 'succeeded', durationMs: Date.now() - started };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.fail(`${plan.action} ${name}: ${message}`);
      return { unit: name, path: unitPath, status: 'failed', error: message, durationMs: Date.now() - started };
    } finally {
      if (lock) {
        await lock.release();
      }
    }
  }

  /**
   * `output` only reads state, so dependency outputs are not needed.
   */
  private async resolve(name: string, plan: ExecutionPlan): Promise<ResolvedUnit> {
    if (plan.action === 'output') {
      const unit = this.stack.units.get(name);
      if (!unit) {
        throw new ExecutionError(ErrorCodes.UNIT_FAILED, `Unknown unit '${name}'`, { unit: name });
      }
      return { unit, action: plan.action, values: unit.values, dependencies: [] };
    }
    return this.resolver.resolveUnit(name, plan.action);
  }

  private pathOf(name: string): string {
    return this.stack.units.get(name)?.path ?? name;
  }
}
