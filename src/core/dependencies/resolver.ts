/**
 * Dependency output resolution and reference rewriting.
 *
 * Per edge, outputs come from (in order of precedence):
 *   disabled edge            -> none; references become null
 *   skip_outputs             -> mock_outputs (or none); real outputs never read
 *   provider applied         -> real outputs from the OutputStore
 *   mock allowed for action  -> mock_outputs
 *   otherwise                -> UnresolvedDependencyError
 */
import { UnresolvedDependencyError } from '../../utils/errors.js';
import type { UnitAction } from '../actions.js';
import type { DependencyEdge } from '../graph/types.js';
import type { Stack, Unit } from '../stack/types.js';
import { NULL_VALUE, listValue, mapValue } from '../values/convert.js';
import type { RefValue, Value, ValueMap } from '../values/types.js';
import type { OutputStore, Outputs } from './output-store.js';

export type OutputSource = 'outputs' | 'mock' | 'skipped' | 'disabled';

export interface ResolvedDependency {
  edge: DependencyEdge;
  /** Provider unit path */
  target: string;
  source: OutputSource;
  /** null when the edge contributes no outputs */
  outputs: Outputs | null;
}

export interface ResolvedUnit {
  unit: Unit;
  action: UnitAction;
  /** Values with every reference rewritten */
  values: ValueMap;
  dependencies: ResolvedDependency[];
}

/**
 * Pick the value a reference stands for:
 * explicit output, then the output named like the enclosing key, then the
 * sole output, then the whole mapping.
 */
export function selectOutput(ref: RefValue, outputs: Outputs | null, provider: string): Value {
  if (outputs === null) {
    return NULL_VALUE;
  }
  if (ref.output !== undefined) {
    if (!Object.prototype.hasOwnProperty.call(outputs, ref.output)) {
      throw new UnresolvedDependencyError(
        `Unit '${provider}' has no output named '${ref.output}'`,
        { provider, output: ref.output, available: Object.keys(outputs) }
      );
    }
    return outputs[ref.output];
  }
  if (ref.key !== undefined && Object.prototype.hasOwnProperty.call(outputs, ref.key)) {
    return outputs[ref.key];
  }
  const keys = Object.keys(outputs);
  if (keys.length === 1) {
    return outputs[keys[0]];
  }
  return mapValue({ ...outputs });
}

/**
 * Rewrite references to `target` inside a value. Anything that is not a
 * reference to `target` is returned unchanged, so a second pass is a no-op.
 */
export function substituteReferences(
  value: Value,
  target: string,
  outputs: Outputs | null,
  provider: string = target
): Value {
  switch (value.kind) {
    case 'ref':
      return value.target === target ? selectOutput(value, outputs, provider) : value;
    case 'list':
      return listValue(value.items.map((item) => substituteReferences(item, target, outputs, provider)));
    case 'map': {
      const entries: ValueMap = {};
      for (const [key, item] of Object.entries(value.entries)) {
        entries[key] = substituteReferences(item, target, outputs, provider);
      }
      return mapValue(entries);
    }
    default:
      return value;
  }
}

function findRemainingReference(value: Value): RefValue | undefined {
  switch (value.kind) {
    case 'ref':
      return value;
    case 'list':
      for (const item of value.items) {
        const found = findRemainingReference(item);
        if (found) return found;
      }
      return undefined;
    case 'map':
      for (const item of Object.values(value.entries)) {
        const found = findRemainingReference(item);
        if (found) return found;
      }
      return undefined;
    default:
      return undefined;
  }
}

export class DependencyResolver {
  constructor(
    private readonly stack: Stack,
    private readonly store: OutputStore
  ) {}

  /**
   * Decide where an edge's outputs come from for `action`.
   *
   * @throws UnresolvedDependencyError when the provider has no outputs and
   *   mocks are not allowed (or not defined) for the action
   */
  async resolveEdge(edge: DependencyEdge, action: UnitAction): Promise<ResolvedDependency> {
    const provider = this.unit(edge.to);

    if (!edge.enabled) {
      return { edge, target: provider.path, source: 'disabled', outputs: null };
    }
    if (edge.skipOutputs) {
      return { edge, target: provider.path, source: 'skipped', outputs: edge.mockOutputs ?? {} };
    }

    const real = await this.store.get(provider.path);
    if (real) {
      return { edge, target: provider.path, source: 'outputs', outputs: real };
    }

    if (edge.mockOutputs && edge.mockAllowedActions.includes(action)) {
      return { edge, target: provider.path, source: 'mock', outputs: edge.mockOutputs };
    }

    const reason = edge.mockOutputs
      ? `mock outputs are only allowed for ${edge.mockAllowedActions.join(', ') || 'no actions'}`
      : 'no mock outputs are defined';
    throw new UnresolvedDependencyError(
      `Unit '${edge.from}' depends on '${edge.to}', which has not been applied; ${reason} (action: ${action})`,
      { unit: edge.from, dependency: edge.to, action }
    );
  }

  /**
   * Resolve every dependency of a unit and rewrite its values.
   */
  async resolveUnit(name: string, action: UnitAction): Promise<ResolvedUnit> {
    const unit = this.unit(name);
    const dependencies: ResolvedDependency[] = [];
    let values: Value = mapValue(unit.values);

    for (const edge of this.stack.graph.edgesFrom(name)) {
      const resolved = await this.resolveEdge(edge, action);
      dependencies.push(resolved);
      values = substituteReferences(values, resolved.target, resolved.outputs, edge.to);
    }

    const leftover = findRemainingReference(values);
    if (leftover) {
      throw new UnresolvedDependencyError(
        `Unit '${name}' references '${leftover.path}', which is not one of its dependencies`,
        { unit: name, reference: leftover.path }
      );
    }

    return {
      unit,
      action,
      values: values.kind === 'map' ? values.entries : {},
      dependencies,
    };
  }

  private unit(name: string): Unit {
    const unit = this.stack.units.get(name);
    if (!unit) {
      throw new UnresolvedDependencyError(`Unknown unit '${name}'`, { unit: name });
    }
    return unit;
  }
}
