/**
 * Writes the expanded stack to disk so it can be inspected or executed.
 */
import * as path from 'node:path';
import { globFiles, removePath, writeJson } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { StackError, ErrorCodes } from '../../utils/errors.js';
import type { Stack } from '../stack/types.js';
import { toPlainMap } from '../values/convert.js';
import type { PlainValue } from '../values/types.js';

export const UNIT_FILE = 'unit.json';

export interface GeneratedDependency {
  name: string;
  path: string;
  enabled: boolean;
  skip_outputs: boolean;
  origin: string;
}

export interface GeneratedUnit {
  name: string;
  path: string;
  source: string;
  values: { [key: string]: PlainValue };
  dependencies: GeneratedDependency[];
}

export function describeUnit(stack: Stack, name: string): GeneratedUnit {
  const unit = stack.units.get(name);
  if (!unit) {
    throw new StackError(ErrorCodes.UNKNOWN_UNIT, `Unit '${name}' is not part of stack '${stack.name}'`, { unit: name });
  }
  return {
    name: unit.name,
    path: unit.path,
    source: unit.source.raw,
    values: toPlainMap(unit.values),
    dependencies: stack.graph.edgesFrom(name).map((edge) => ({
      name: edge.to,
      path: stack.units.get(edge.to)?.path ?? edge.to,
      enabled: edge.enabled,
      skip_outputs: edge.skipOutputs,
      origin: edge.origin,
    })),
  };
}

/**
 * Write `<outputDir>/<unit path>/unit.json` for every unit.
 *
 * @returns absolute paths of the written files, in declaration order
 */
export async function generateStack(stack: Stack, outputDir: string): Promise<string[]> {
  const root = path.resolve(stack.dir, outputDir);
  const written: string[] = [];
  for (const name of stack.units.keys()) {
    const described = describeUnit(stack, name);
    const file = path.join(root, described.path, UNIT_FILE);
    await writeJson(file, described);
    written.push(file);
  }
  logger.info(`Generated ${written.length} unit(s) in ${root}`);
  return written;
}

/**
 * Remove every generated output directory named `outputDirName` below `cwd`.
 *
 * @returns removed directories, absolute
 */
export async function cleanGenerated(cwd: string, outputDirName: string): Promise<string[]> {
  const name = path.basename(outputDirName);
  const found = await globFiles([`**/${name}`], { cwd, onlyDirectories: true, absolute: true });
  // Nested matches disappear with their parent.
  const roots = found
    .sort()
    .filter((dir, index, all) => !all.slice(0, index).some((parent) => dir.startsWith(`${parent}/`)));
  for (const dir of roots) {
    await removePath(dir);
    logger.debug(`Removed ${dir}`);
  }
  return roots;
}
