/**
 * Expands a stack definition into units and a dependency graph.
 *
 * Order of work: locals, unit paths, values, reference detection, edges.
 * Every structural problem (duplicate names or paths, unknown dependencies,
 * cycles, malformed sources) is raised here, before anything runs.
 */
import * as path from 'node:path';
import {
  DuplicateUnitNameError,
  DuplicateUnitPathError,
  StackError,
  UnknownDependencyError,
  ErrorCodes,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_MOCK_ACTIONS } from '../actions.js';
import { configScopeValue, type ResolvedConfig } from '../config/hierarchy.js';
import { evaluateString, evaluateTemplate, evaluateValue, type Scope } from '../expressions/evaluator.js';
import { UnitGraph } from '../graph/dag.js';
import type { DependencyEdge } from '../graph/types.js';
import { parseSource } from '../source/parser.js';
import {
  REF_KEY,
  asBoolean,
  fromPlain,
  fromPlainMap,
  listValue,
  mapValue,
  stringValue,
} from '../values/convert.js';
import type { Value, ValueMap } from '../values/types.js';
import type { DependencyBlock, StackDefinition, UnitDefinition } from './schema.js';
import type { BuildStackOptions, Stack, Unit } from './types.js';

const RELATIVE_PATH_PATTERN = /^\.\.?\//;

/**
 * Normalize a declared unit path to a clean stack-relative POSIX path.
 */
export function normalizeUnitPath(raw: string, unitName: string): string {
  const normalized = path.posix.normalize(raw.replace(/\\/g, '/')).replace(/^\.\//, '').replace(/\/+$/, '');
  if (!normalized || normalized === '.' || path.posix.isAbsolute(normalized) || normalized.startsWith('..')) {
    throw new StackError(
      ErrorCodes.STACK_INVALID,
      `Unit '${unitName}' has path '${raw}', which must stay inside the stack`,
      { unit: unitName, path: raw }
    );
  }
  return normalized;
}

/**
 * Resolve a relative reference written inside a unit to a stack-relative path.
 */
export function resolveRelative(unitPath: string, relative: string): string {
  return path.posix.normalize(path.posix.join(unitPath, relative)).replace(/\/+$/, '');
}

function evaluateFlag(raw: boolean | string, scope: Scope, what: string): boolean {
  if (typeof raw === 'boolean') return raw;
  const result = asBoolean(evaluateTemplate(raw, scope));
  if (result === undefined) {
    throw new StackError(ErrorCodes.STACK_INVALID, `${what} must evaluate to a boolean, got '${raw}'`, {
      what,
      expression: raw,
    });
  }
  return result;
}

function evaluateLocals(definition: StackDefinition, config: Value): ValueMap {
  const locals: ValueMap = {};
  for (const [key, raw] of Object.entries(definition.locals)) {
    locals[key] = evaluateValue(fromPlain(raw, `locals.${key}`), {
      config,
      local: mapValue({ ...locals }),
    });
  }
  return locals;
}

interface UnitContext {
  definition: UnitDefinition;
  unit: Unit;
  scope: Scope;
}

/**
 * Replace relative-path strings that point at sibling units (and explicit
 * `{ $ref }` mappings) with reference values.
 */
function attachReferences(
  value: Value,
  ctx: UnitContext,
  unitsByPath: ReadonlyMap<string, Unit>,
  skipped: ReadonlySet<string>,
  key?: string
): Value {
  switch (value.kind) {
    case 'string': {
      if (!RELATIVE_PATH_PATTERN.test(value.value)) return value;
      const target = resolveRelative(ctx.unit.path, value.value);
      if (target === ctx.unit.path || !unitsByPath.has(target) || skipped.has(target)) {
        return value;
      }
      return { kind: 'ref', path: value.value, target, key };
    }
    case 'list':
      return listValue(value.items.map((item) => attachReferences(item, ctx, unitsByPath, skipped, key)));
    case 'map': {
      const explicit = value.entries[REF_KEY];
      if (explicit) {
        return explicitReference(value.entries, explicit, ctx, unitsByPath, key);
      }
      const entries: ValueMap = {};
      for (const [k, item] of Object.entries(value.entries)) {
        entries[k] = attachReferences(item, ctx, unitsByPath, skipped, k);
      }
      return mapValue(entries);
    }
    default:
      return value;
  }
}

function explicitReference(
  entries: ValueMap,
  refPath: Value,
  ctx: UnitContext,
  unitsByPath: ReadonlyMap<string, Unit>,
  key: string | undefined
): Value {
  const output = entries.output;
  const extra = Object.keys(entries).filter((k) => k !== REF_KEY && k !== 'output');
  if (refPath.kind !== 'string' || (output && output.kind !== 'string') || extra.length > 0) {
    throw new StackError(
      ErrorCodes.STACK_INVALID,
      `Unit '${ctx.unit.name}' has a malformed ${REF_KEY}; expected { ${REF_KEY}: <relative path>, output?: <name> }`,
      { unit: ctx.unit.name }
    );
  }
  const target = resolveRelative(ctx.unit.path, refPath.value);
  if (!unitsByPath.has(target)) {
    throw new UnknownDependencyError(ctx.unit.name, refPath.value);
  }
  return {
    kind: 'ref',
    path: refPath.value,
    target,
    output: output && output.kind === 'string' ? output.value : undefined,
    key,
  };
}

function collectTargets(value: Value, into: Set<string>): void {
  switch (value.kind) {
    case 'ref':
      into.add(value.target);
      break;
    case 'list':
      value.items.forEach((item) => collectTargets(item, into));
      break;
    case 'map':
      Object.values(value.entries).forEach((item) => collectTargets(item, into));
      break;
    default:
      break;
  }
}

function edgeFromBlock(
  from: string,
  to: string,
  block: DependencyBlock,
  scope: Scope,
  referenced: boolean
): DependencyEdge {
  const where = `Dependency '${to}' of unit '${from}'`;
  return {
    from,
    to,
    enabled: evaluateFlag(block.enabled, scope, `${where}: enabled`),
    skipOutputs: evaluateFlag(block.skip_outputs, scope, `${where}: skip_outputs`),
    mockOutputs: block.mock_outputs
      ? evaluateMap(fromPlainMap(block.mock_outputs, `${where}.mock_outputs`), scope)
      : undefined,
    mockAllowedActions: block.mock_outputs_allowed_actions ?? [...DEFAULT_MOCK_ACTIONS],
    origin: referenced ? 'both' : 'declared',
  };
}

function evaluateMap(map: ValueMap, scope: Scope): ValueMap {
  const result = evaluateValue(mapValue(map), scope);
  return result.kind === 'map' ? result.entries : {};
}

/**
 * Build a stack from its definition and the resolved hierarchy config.
 *
 * @throws DuplicateUnitNameError, DuplicateUnitPathError,
 *   UnknownDependencyError, CyclicDependencyError, InvalidSourceError,
 *   ExpressionError, StackError
 */
export function buildStack(
  definition: StackDefinition,
  config: ResolvedConfig,
  options: BuildStackOptions
): Stack {
  const stackName = options.name ?? definition.name ?? path.basename(path.resolve(options.dir));
  const configValue = configScopeValue(config);
  const locals = evaluateLocals(definition, configValue);
  const localValue = mapValue(locals);

  // Names and paths first, so references can be checked against every sibling.
  const contexts: UnitContext[] = [];
  const byName = new Map<string, Unit>();
  const byPath = new Map<string, Unit>();

  for (const def of definition.units) {
    if (byName.has(def.name)) {
      throw new DuplicateUnitNameError(stackName, def.name);
    }

    const nameScope: Scope = {
      config: configValue,
      local: localValue,
      unit: mapValue({ name: stringValue(def.name) }),
    };
    const unitPath = normalizeUnitPath(evaluateString(def.path ?? def.name, nameScope, `path of unit '${def.name}'`), def.name);
    const clash = byPath.get(unitPath);
    if (clash) {
      throw new DuplicateUnitPathError(stackName, unitPath, [clash.name, def.name]);
    }

    const scope: Scope = {
      ...nameScope,
      unit: mapValue({ name: stringValue(def.name), path: stringValue(unitPath) }),
    };
    const unit: Unit = {
      name: def.name,
      path: unitPath,
      source: parseSource(evaluateString(def.source, scope, `source of unit '${def.name}'`)),
      values: {},
    };
    byName.set(unit.name, unit);
    byPath.set(unit.path, unit);
    contexts.push({ definition: def, unit, scope });
  }

  const graph = new UnitGraph();
  for (const { unit } of contexts) {
    graph.addNode(unit.name);
  }

  for (const ctx of contexts) {
    const skipped = new Set(ctx.definition.skip_references.map((p) => resolveRelative(ctx.unit.path, p)));
    const evaluated = evaluateValue(mapValue(fromPlainMap(ctx.definition.values, `${ctx.unit.name}.values`)), ctx.scope);
    const withRefs = attachReferences(evaluated, ctx, byPath, skipped);
    ctx.unit.values = withRefs.kind === 'map' ? withRefs.entries : {};
  }

  for (const ctx of contexts) {
    const referenced = new Set<string>();
    collectTargets(mapValue(ctx.unit.values), referenced);
    const referencedNames = new Set([...referenced].map((p) => byPath.get(p)?.name ?? p));

    const edges = new Map<string, DependencyEdge>();
    for (const name of referencedNames) {
      edges.set(name, {
        from: ctx.unit.name,
        to: name,
        enabled: true,
        skipOutputs: false,
        mockAllowedActions: [...DEFAULT_MOCK_ACTIONS],
        origin: 'reference',
      });
    }

    for (const [key, block] of Object.entries(ctx.definition.dependencies)) {
      const provider = block.path
        ? byPath.get(resolveRelative(ctx.unit.path, block.path))
        : byName.get(key);
      if (!provider) {
        throw new UnknownDependencyError(ctx.unit.name, block.path ?? key);
      }
      edges.set(provider.name, edgeFromBlock(ctx.unit.name, provider.name, block, ctx.scope, referencedNames.has(provider.name)));
    }

    for (const edge of edges.values()) {
      graph.addEdge(edge);
      logger.debug(`Edge ${edge.from} -> ${edge.to}`, {
        enabled: edge.enabled,
        skipOutputs: edge.skipOutputs,
        origin: edge.origin,
      });
    }
  }

  return {
    name: stackName,
    dir: path.resolve(options.dir),
    file: options.file ?? null,
    locals,
    units: byName,
    graph,
    config,
  };
}
