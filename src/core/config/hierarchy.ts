/**
 * Directory-hierarchy configuration (root / account / region / environment).
 *
 * The hierarchy is resolved once, from the stack's directory, and the
 * resulting ResolvedConfig is passed explicitly to everything that needs it.
 */
import * as path from 'node:path';
import { fileExists } from '../../utils/file-system.js';
import { loadYaml } from '../../utils/yaml.js';
import { ConfigError, ConfigNotFoundError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { fromPlainMap, mapValue } from '../values/convert.js';
import { mergeShallow } from '../values/merge.js';
import type { MapValue, ValueMap } from '../values/types.js';
import type { HierarchySettings } from './schema.js';

/**
 * Values contributed by one hierarchy level.
 */
export interface ConfigFragment {
  level: string;
  /** Absolute path of the file, or null when the level was absent */
  file: string | null;
  values: ValueMap;
}

/**
 * Merged configuration for one stack directory.
 */
export interface ResolvedConfig {
  startDir: string;
  /** Directory holding the root marker, or null when the walk hit the filesystem root */
  rootDir: string | null;
  /** Fragments ordered root-most first */
  fragments: ConfigFragment[];
  values: ValueMap;
}

/**
 * Merge fragments root-to-leaf. Closer levels win for identical keys;
 * nested mappings are replaced, not merged.
 */
export function mergeFragments(fragments: ConfigFragment[]): ValueMap {
  return mergeShallow(fragments.map((f) => f.values));
}

/**
 * Expose merged config to expressions as `config`.
 */
export function configScopeValue(config: ResolvedConfig): MapValue {
  return mapValue(config.values);
}

async function readFragment(level: string, file: string): Promise<ConfigFragment> {
  const data = await loadYaml(file);
  if (data === null || data === undefined) {
    return { level, file, values: {} };
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Configuration file ${file} must contain a mapping`,
      { file, level }
    );
  }
  return { level, file, values: fromPlainMap(Object.fromEntries(Object.entries(data)), path.basename(file)) };
}

/**
 * Walk upward from `startDir`, picking the nearest file for each level,
 * until the directory holding the root marker (inclusive) or the
 * filesystem root.
 *
 * @throws ConfigNotFoundError when a required level has no file
 */
export async function loadHierarchy(
  startDir: string,
  settings: HierarchySettings
): Promise<ResolvedConfig> {
  const start = path.resolve(startDir);
  const found = new Map<string, string>();
  let rootDir: string | null = null;
  let dir = start;

  for (;;) {
    for (const level of settings.levels) {
      if (found.has(level.name)) continue;
      const candidate = path.join(dir, level.file);
      if (await fileExists(candidate)) {
        found.set(level.name, candidate);
      }
    }

    if (await fileExists(path.join(dir, settings.root_file))) {
      rootDir = dir;
      break;
    }

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  const fragments: ConfigFragment[] = [];
  for (const level of settings.levels) {
    const file = found.get(level.name);
    if (!file) {
      if (level.required) {
        throw new ConfigNotFoundError(level.name, level.file, start);
      }
      logger.debug(`No ${level.name} configuration (${level.file}) above ${start}`);
      fragments.push({ level: level.name, file: null, values: {} });
      continue;
    }
    fragments.push(await readFragment(level.name, file));
  }

  return {
    startDir: start,
    rootDir,
    fragments,
    values: mergeFragments(fragments),
  };
}
