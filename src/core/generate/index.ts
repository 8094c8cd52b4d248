export {
  generateStack,
  cleanGenerated,
  describeUnit,
  UNIT_FILE,
  type GeneratedUnit,
  type GeneratedDependency,
} from './generator.js';
