import type { Value, ValueMap } from './types.js';

/**
 * Shallow override: later maps replace earlier keys wholesale.
 */
export function mergeShallow(maps: ValueMap[]): ValueMap {
  return maps.reduce<ValueMap>((merged, next) => ({ ...merged, ...next }), {});
}

/**
 * Deep merge used by the `merge()` expression function. Nested mappings are
 * merged key by key; any other kind in a later argument replaces the earlier one.
 */
export function mergeDeep(maps: ValueMap[]): ValueMap {
  const result: ValueMap = {};
  for (const map of maps) {
    for (const [key, value] of Object.entries(map)) {
      const existing = result[key];
      result[key] = existing ? mergeValue(existing, value) : value;
    }
  }
  return result;
}

function mergeValue(left: Value, right: Value): Value {
  if (left.kind === 'map' && right.kind === 'map') {
    return { kind: 'map', entries: mergeDeep([left.entries, right.entries]) };
  }
  return right;
}
