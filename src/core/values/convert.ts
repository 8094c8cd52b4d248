/**
 * Conversions between plain data (YAML/JSON) and tagged values.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { Value, MapValue, PlainValue, ValueMap } from './types.js';

/** Key marking the explicit reference form `{ $ref: "../acm", output: cert_arn }`. */
export const REF_KEY = '$ref';

export function stringValue(value: string): Value {
  return { kind: 'string', value };
}

export function numberValue(value: number): Value {
  return { kind: 'number', value };
}

export function boolValue(value: boolean): Value {
  return { kind: 'bool', value };
}

export const NULL_VALUE: Value = { kind: 'null' };

export function listValue(items: Value[]): Value {
  return { kind: 'list', items };
}

export function mapValue(entries: ValueMap): MapValue {
  return { kind: 'map', entries };
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Convert parsed YAML/JSON data into a tagged value.
 * The explicit reference form is kept as a mapping; references are only
 * attached once the surrounding stack is known.
 */
export function fromPlain(input: unknown, where = 'value'): Value {
  if (input === null || input === undefined) {
    return NULL_VALUE;
  }
  switch (typeof input) {
    case 'string':
      return stringValue(input);
    case 'number':
      return numberValue(input);
    case 'boolean':
      return boolValue(input);
    default:
      break;
  }
  if (Array.isArray(input)) {
    return listValue(input.map((item, i) => fromPlain(item, `${where}[${i}]`)));
  }
  if (isRecord(input)) {
    const entries: ValueMap = {};
    for (const [key, item] of Object.entries(input)) {
      entries[key] = fromPlain(item, `${where}.${key}`);
    }
    return mapValue(entries);
  }
  throw new ConfigError(
    ErrorCodes.CONFIG_INVALID,
    `Unsupported value at ${where}: ${typeof input}`,
    { where }
  );
}

/**
 * Convert a plain mapping into a value map.
 */
export function fromPlainMap(input: Record<string, unknown>, where = 'values'): ValueMap {
  const entries: ValueMap = {};
  for (const [key, item] of Object.entries(input)) {
    entries[key] = fromPlain(item, `${where}.${key}`);
  }
  return entries;
}

/**
 * Convert a tagged value back into plain data. Unresolved references are
 * written in their explicit `{ $ref }` form.
 */
export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case 'string':
    case 'number':
    case 'bool':
      return value.value;
    case 'null':
      return null;
    case 'list':
      return value.items.map(toPlain);
    case 'map':
      return toPlainMap(value.entries);
    case 'ref':
      return value.output
        ? { [REF_KEY]: value.path, output: value.output }
        : { [REF_KEY]: value.path };
  }
}

export function toPlainMap(entries: ValueMap): { [key: string]: PlainValue } {
  const result: { [key: string]: PlainValue } = {};
  for (const [key, item] of Object.entries(entries)) {
    result[key] = toPlain(item);
  }
  return result;
}

/**
 * Walk a dotted path through nested mappings.
 *
 * @returns the value, or undefined when any segment is missing
 */
export function lookupPath(value: Value, segments: string[]): Value | undefined {
  let current: Value | undefined = value;
  for (const segment of segments) {
    if (!current) return undefined;
    if (current.kind === 'map') {
      if (!Object.prototype.hasOwnProperty.call(current.entries, segment)) return undefined;
      current = current.entries[segment];
    } else if (current.kind === 'list' && /^\d+$/.test(segment)) {
      current = current.items[Number(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Read a boolean, accepting the string forms "true" and "false".
 */
export function asBoolean(value: Value): boolean | undefined {
  if (value.kind === 'bool') return value.value;
  if (value.kind === 'string') {
    if (value.value === 'true') return true;
    if (value.value === 'false') return false;
  }
  return undefined;
}
