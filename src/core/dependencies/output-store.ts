/**
 * Where unit outputs live between runs.
 *
 * A unit counts as "applied" exactly when the store holds outputs for it.
 */
import * as path from 'node:path';
import { fileExists, readFile, removePath, writeJson } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { fromPlainMap, toPlainMap } from '../values/convert.js';
import type { ValueMap } from '../values/types.js';

export type Outputs = ValueMap;

export interface OutputStore {
  get(unitPath: string): Promise<Outputs | undefined>;
  set(unitPath: string, outputs: Outputs): Promise<void>;
  delete(unitPath: string): Promise<void>;
}

/**
 * In-process store, used for single runs and tests.
 */
export class MemoryOutputStore implements OutputStore {
  private readonly outputs = new Map<string, Outputs>();

  constructor(initial: Record<string, Outputs> = {}) {
    for (const [unitPath, outputs] of Object.entries(initial)) {
      this.outputs.set(unitPath, outputs);
    }
  }

  async get(unitPath: string): Promise<Outputs | undefined> {
    return this.outputs.get(unitPath);
  }

  async set(unitPath: string, outputs: Outputs): Promise<void> {
    this.outputs.set(unitPath, outputs);
  }

  async delete(unitPath: string): Promise<void> {
    this.outputs.delete(unitPath);
  }
}

const OUTPUTS_FILE = 'outputs.json';

/**
 * Stores outputs as `<baseDir>/<unit path>/outputs.json`, beside the
 * generated unit directory.
 */
export class FileOutputStore implements OutputStore {
  constructor(private readonly baseDir: string) {}

  filePath(unitPath: string): string {
    return path.join(this.baseDir, unitPath, OUTPUTS_FILE);
  }

  async get(unitPath: string): Promise<Outputs | undefined> {
    const file = this.filePath(unitPath);
    if (!(await fileExists(file))) {
      return undefined;
    }
    let data: unknown;
    try {
      data = JSON.parse(await readFile(file));
    } catch (error) {
      throw new SystemError(
        ErrorCodes.PARSE_ERROR,
        `Failed to read outputs from ${file}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { file }
      );
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new SystemError(ErrorCodes.PARSE_ERROR, `Outputs file ${file} must contain an object`, { file });
    }
    return fromPlainMap(Object.fromEntries(Object.entries(data)), OUTPUTS_FILE);
  }

  async set(unitPath: string, outputs: Outputs): Promise<void> {
    await writeJson(this.filePath(unitPath), toPlainMap(outputs));
  }

  async delete(unitPath: string): Promise<void> {
    await removePath(this.filePath(unitPath));
  }
}
