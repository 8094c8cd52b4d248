/**
 * Tagged value model for unit `values`, locals and configuration.
 *
 * Symbolic references are a distinct variant, so a relative path that is
 * meant as plain text (or was opted out) can never be mistaken for a
 * substitution request.
 */

export type Value =
  | StringValue
  | NumberValue
  | BoolValue
  | NullValue
  | ListValue
  | MapValue
  | RefValue;

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface NumberValue {
  kind: 'number';
  value: number;
}

export interface BoolValue {
  kind: 'bool';
  value: boolean;
}

export interface NullValue {
  kind: 'null';
}

export interface ListValue {
  kind: 'list';
  items: Value[];
}

export interface MapValue {
  kind: 'map';
  entries: Record<string, Value>;
}

export interface RefValue {
  kind: 'ref';
  /** Relative path as written, e.g. "../acm" */
  path: string;
  /** Stack-relative path of the targeted unit, e.g. "acm" */
  target: string;
  /** Explicitly requested output name */
  output?: string;
  /** Mapping key the reference sits under, used to pick a same-named output */
  key?: string;
}

/** Plain JSON data as written to disk or handed to the engine. */
export type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

export type ValueMap = Record<string, Value>;
