import * as path from 'node:path';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { StackDefinitionError, StackweaveError } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import { loadHierarchy } from '../config/hierarchy.js';
import type { HierarchySettings } from '../config/schema.js';
import { buildStack } from './builder.js';
import { StackDefinitionSchema, type StackDefinition } from './schema.js';
import type { Stack } from './types.js';

/**
 * Load and validate a stack definition file.
 */
export async function loadStackDefinition(file: string): Promise<StackDefinition> {
  if (!(await fileExists(file))) {
    throw new StackDefinitionError(file, 'file not found');
  }
  try {
    return await loadYamlWithSchema(file, StackDefinitionSchema);
  } catch (error) {
    if (error instanceof StackweaveError) {
      throw new StackDefinitionError(file, error.message, error.details);
    }
    throw error;
  }
}

/**
 * Load a stack file, resolve the configuration hierarchy from its directory
 * and build the stack.
 */
export async function loadStack(file: string, hierarchy: HierarchySettings): Promise<Stack> {
  const absolute = path.resolve(file);
  const dir = path.dirname(absolute);
  const definition = await loadStackDefinition(absolute);
  const config = await loadHierarchy(dir, hierarchy);
  return buildStack(definition, config, { dir, file: absolute });
}
