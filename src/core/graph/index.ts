export { UnitGraph } from './dag.js';
export { GraphFormatter } from './formatter.js';
export type { GraphView } from './formatter.js';
export type { DependencyEdge, GraphFormat } from './types.js';
