export { buildStack, normalizeUnitPath, resolveRelative } from './builder.js';
export { loadStack, loadStackDefinition } from './loader.js';
export {
  StackDefinitionSchema,
  UnitDefinitionSchema,
  DependencyBlockSchema,
  type StackDefinition,
  type UnitDefinition,
  type DependencyBlock,
} from './schema.js';
export type { Stack, Unit, BuildStackOptions } from './types.js';
