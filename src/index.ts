/**
 * stackweave library exports.
 */

// Configuration and hierarchy
export * from './core/config/index.js';

// Values and expressions
export * from './core/values/index.js';
export { evaluateExpression, evaluateTemplate, evaluateValue, evaluateString, type Scope } from './core/expressions/evaluator.js';
export { parseSource, formatSource, type SourceReference } from './core/source/parser.js';
export * from './core/actions.js';

// Stack and graph
export * from './core/stack/index.js';
export * from './core/graph/index.js';

// Resolution, selection, planning, execution
export * from './core/dependencies/index.js';
export * from './core/filter/index.js';
export * from './core/plan/index.js';
export * from './core/state/index.js';
export * from './core/execution/index.js';
export * from './core/generate/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
