/**
 * What a filter operand matches against.
 */
export type FilterTarget =
  | { kind: 'path'; value: string }
  | { kind: 'prefix'; prefix: string }
  | { kind: 'glob'; pattern: string }
  | { kind: 'git'; from: string; to?: string };

/**
 * One operand: `['!'] ['...'] target ['...']`.
 */
export interface FilterOperand {
  /** Operand text as written */
  text: string;
  target: FilterTarget;
  negated: boolean;
  /** `...target`: include every unit that transitively depends on a match */
  withDependents: boolean;
  /** `target...`: include every transitive dependency of a match */
  withDependencies: boolean;
}

/**
 * A parsed filter: operands joined with `|` are intersected.
 */
export interface FilterExpression {
  source: string;
  operands: FilterOperand[];
  /** True when every operand is negated; such filters subtract from the selection */
  negative: boolean;
}

/**
 * Outcome of evaluating a set of filters against a stack.
 */
export interface FilterResult {
  /** Selected unit names, in declaration order */
  selected: Set<string>;
  /** Units removed from the selection by a negative filter */
  excluded: Set<string>;
  filters: FilterExpression[];
}

/**
 * Supplies files changed between two refs, relative to the stack directory.
 */
export interface ChangedFilesProvider {
  changedFiles(from: string, to?: string): Promise<string[]>;
}
