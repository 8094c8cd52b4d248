/**
 * Turns a filter result into an ordered execution plan.
 */
import { ExcludedDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { UnitAction } from '../actions.js';
import type { ExclusionPolicy } from '../config/schema.js';
import type { FilterResult } from '../filter/types.js';
import type { Stack } from '../stack/types.js';

export type PlanReason = 'selected' | 'reincluded';

export interface PlanEntry {
  unit: string;
  reason: PlanReason;
}

export interface ExecutionPlan {
  action: UnitAction;
  /** Units to run, providers first (dependents first for destroy) */
  entries: PlanEntry[];
  /** Units not in the plan, in declaration order */
  notSelected: string[];
  /** Units excluded by a negative filter that stayed out of the plan */
  excluded: string[];
  warnings: string[];
}

/**
 * Apply the exclusion policy and order the selection.
 *
 * An excluded unit is "required" when a selected unit depends on it
 * (for destroy: when it depends on a selected unit, since dependents must
 * be destroyed first).
 *
 * @throws ExcludedDependencyError under the `error` policy
 */
export function createExecutionPlan(
  stack: Stack,
  filter: Pick<FilterResult, 'selected' | 'excluded'>,
  action: UnitAction,
  policy: ExclusionPolicy = 'reinclude'
): ExecutionPlan {
  const graph = stack.graph;
  const destroying = action === 'destroy';
  const selected = [...filter.selected];

  const requiredBy = new Map<string, string>();
  for (const name of selected) {
    const related = destroying ? graph.transitiveDependents([name]) : graph.transitiveDependencies([name]);
    for (const other of related) {
      if (filter.excluded.has(other) && !filter.selected.has(other) && !requiredBy.has(other)) {
        requiredBy.set(other, name);
      }
    }
  }

  const order = graph.topologicalOrder();
  const pairs = order
    .filter((name) => requiredBy.has(name))
    .map((name) => ({ unit: name, requiredBy: requiredBy.get(name) ?? '' }));

  if (pairs.length > 0 && policy === 'error') {
    throw new ExcludedDependencyError(pairs);
  }

  const warnings: string[] = [];
  for (const pair of pairs) {
    const warning = destroying
      ? `Unit '${pair.unit}' was excluded by a filter but depends on '${pair.requiredBy}', which is being destroyed; including it`
      : `Unit '${pair.unit}' was excluded by a filter but is required by '${pair.requiredBy}'; including it`;
    logger.warn(warning);
    warnings.push(warning);
  }

  const inPlan = (name: string) => filter.selected.has(name) || requiredBy.has(name);
  const ordered = order.filter(inPlan);
  if (destroying) {
    ordered.reverse();
  }

  return {
    action,
    entries: ordered.map((unit) => ({
      unit,
      reason: filter.selected.has(unit) ? 'selected' : 'reincluded',
    })),
    notSelected: graph.nodes().filter((name) => !inPlan(name)),
    excluded: graph.nodes().filter((name) => filter.excluded.has(name) && !inPlan(name)),
    warnings,
  };
}
