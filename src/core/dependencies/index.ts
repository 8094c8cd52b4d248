export {
  DependencyResolver,
  selectOutput,
  substituteReferences,
  type OutputSource,
  type ResolvedDependency,
  type ResolvedUnit,
} from './resolver.js';
export { MemoryOutputStore, FileOutputStore, type OutputStore, type Outputs } from './output-store.js';
