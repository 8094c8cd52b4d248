export { parseFilter } from './parser.js';
export { FilterEngine, GitChangedFilesProvider, evaluateFilters, type FilterEngineOptions } from './engine.js';
export type {
  ChangedFilesProvider,
  FilterExpression,
  FilterOperand,
  FilterResult,
  FilterTarget,
} from './types.js';
