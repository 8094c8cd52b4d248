/**
 * Error types and codes for stackweave.
 * This is the error contract - all errors should extend StackweaveError.
 */

/**
 * Base error class for all stackweave errors.
 */
export class StackweaveError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StackweaveError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// Error code constants
export const ErrorCodes = {
  // Configuration errors (C001-C004)
  CONFIG_NOT_FOUND: 'C001',
  CONFIG_INVALID: 'C002',
  CONFIG_LOAD_ERROR: 'C003',
  EXPRESSION_ERROR: 'C004',

  // Stack / graph errors (G001-G007)
  STACK_INVALID: 'G001',
  DUPLICATE_UNIT_NAME: 'G002',
  DUPLICATE_UNIT_PATH: 'G003',
  UNKNOWN_DEPENDENCY: 'G004',
  CYCLIC_DEPENDENCY: 'G005',
  INVALID_SOURCE: 'G006',
  UNKNOWN_UNIT: 'G007',

  // Resolution errors (R001)
  UNRESOLVED_DEPENDENCY: 'R001',

  // Filter / plan errors (F001-F002)
  INVALID_FILTER_SYNTAX: 'F001',
  EXCLUDED_DEPENDENCY: 'F002',

  // Execution errors (X001-X003)
  UNIT_FAILED: 'X001',
  STATE_LOCKED: 'X002',
  INVALID_PARALLELISM: 'X003',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  COMMAND_FAILED: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends StackweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A required hierarchy fragment (e.g. account.yaml) was not found.
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(level: string, file: string, startDir: string) {
    super(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Required ${level} configuration '${file}' not found above ${startDir}`,
      { level, file, startDir }
    );
    this.name = 'ConfigNotFoundError';
  }
}

/**
 * Expression evaluation failed (unknown reference, bad function call).
 */
export class ExpressionError extends ConfigError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.EXPRESSION_ERROR, message, details);
    this.name = 'ExpressionError';
  }
}

/**
 * Stack definition and graph-build errors. All of these are fatal and
 * raised before any unit executes.
 */
export class StackError extends StackweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StackError';
  }
}

/**
 * The stack file is missing or does not match the stack schema.
 */
export class StackDefinitionError extends StackError {
  constructor(file: string, reason: string, details?: Record<string, unknown>) {
    super(ErrorCodes.STACK_INVALID, `Invalid stack definition ${file}: ${reason}`, { ...details, file });
    this.name = 'StackDefinitionError';
  }
}

export class DuplicateUnitNameError extends StackError {
  constructor(stack: string, unitName: string) {
    super(
      ErrorCodes.DUPLICATE_UNIT_NAME,
      `Stack '${stack}' declares unit '${unitName}' more than once`,
      { stack, unitName }
    );
    this.name = 'DuplicateUnitNameError';
  }
}

export class DuplicateUnitPathError extends StackError {
  constructor(stack: string, unitPath: string, units: [string, string]) {
    super(
      ErrorCodes.DUPLICATE_UNIT_PATH,
      `Units '${units[0]}' and '${units[1]}' in stack '${stack}' share the path '${unitPath}'`,
      { stack, unitPath, units }
    );
    this.name = 'DuplicateUnitPathError';
  }
}

export class UnknownDependencyError extends StackError {
  constructor(unitName: string, dependency: string) {
    super(
      ErrorCodes.UNKNOWN_DEPENDENCY,
      `Unit '${unitName}' depends on unknown unit '${dependency}'`,
      { unitName, dependency }
    );
    this.name = 'UnknownDependencyError';
  }
}

export class CyclicDependencyError extends StackError {
  constructor(public readonly cycle: string[]) {
    super(
      ErrorCodes.CYCLIC_DEPENDENCY,
      `Circular dependency detected: ${cycle.join(' -> ')}`,
      { cycle }
    );
    this.name = 'CyclicDependencyError';
  }
}

export class InvalidSourceError extends StackError {
  constructor(source: string, reason: string) {
    super(ErrorCodes.INVALID_SOURCE, `Invalid source '${source}': ${reason}`, { source, reason });
    this.name = 'InvalidSourceError';
  }
}

/**
 * A dependency has no outputs and mocks are not allowed for the action.
 */
export class UnresolvedDependencyError extends StackweaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.UNRESOLVED_DEPENDENCY, message, details);
    this.name = 'UnresolvedDependencyError';
  }
}

/**
 * Filter expression errors. The column is 1-based.
 */
export class InvalidFilterSyntaxError extends StackweaveError {
  constructor(
    public readonly expression: string,
    public readonly column: number,
    reason: string
  ) {
    super(
      ErrorCodes.INVALID_FILTER_SYNTAX,
      `Invalid filter '${expression}' at column ${column}: ${reason}`,
      { expression, column, reason }
    );
    this.name = 'InvalidFilterSyntaxError';
  }
}

export class ExcludedDependencyError extends StackweaveError {
  constructor(public readonly pairs: Array<{ unit: string; requiredBy: string }>) {
    super(
      ErrorCodes.EXCLUDED_DEPENDENCY,
      `Excluded units are required by the selection: ${pairs
        .map((p) => `${p.unit} (required by ${p.requiredBy})`)
        .join(', ')}`,
      { pairs }
    );
    this.name = 'ExcludedDependencyError';
  }
}

/**
 * Execution errors (unit failures, lock contention, bad scheduler options).
 */
export class ExecutionError extends StackweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ExecutionError';
  }
}

export class StateLockedError extends ExecutionError {
  constructor(key: string, holder: string) {
    super(ErrorCodes.STATE_LOCKED, `State '${key}' is locked by '${holder}'`, { key, holder });
    this.name = 'StateLockedError';
  }
}

/**
 * System errors (parse errors, failed child processes).
 */
export class SystemError extends StackweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}
