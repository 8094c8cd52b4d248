import type { ResolvedConfig } from '../config/hierarchy.js';
import type { UnitGraph } from '../graph/dag.js';
import type { SourceReference } from '../source/parser.js';
import type { ValueMap } from '../values/types.js';

/**
 * A unit after expression evaluation and reference detection.
 */
export interface Unit {
  name: string;
  /** Normalized stack-relative path, e.g. "networking/vpc" */
  path: string;
  source: SourceReference;
  /** Evaluated values; symbolic references are `ref` values */
  values: ValueMap;
}

/**
 * An expanded stack: its units, locals and dependency graph.
 * Built once per run and not mutated afterwards.
 */
export interface Stack {
  name: string;
  /** Directory of the stack definition */
  dir: string;
  /** Stack definition file, when loaded from disk */
  file: string | null;
  locals: ValueMap;
  /** Units by name, in declaration order */
  units: Map<string, Unit>;
  graph: UnitGraph;
  config: ResolvedConfig;
}

export interface BuildStackOptions {
  /** Directory the stack lives in; used for naming and git matching */
  dir: string;
  file?: string | null;
  /** Overrides the definition's name */
  name?: string;
}
