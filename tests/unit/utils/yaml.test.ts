/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import { loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError } from '../../../src/utils/errors.js';

const UnitSchema = z.object({ name: z.string(), count: z.number().default(1) });

describe('parseYaml', () => {
  it('parses mappings', () => {
    expect(parseYaml('name: vpc\ntags:\n  - a\n')).toEqual({ name: 'vpc', tags: ['a'] });
  });

  it('wraps syntax errors', () => {
    expect(() => parseYaml('a: [1, 2')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('applies defaults', () => {
    expect(parseYamlWithSchema('name: vpc\n', UnitSchema)).toEqual({ name: 'vpc', count: 1 });
  });

  it('names the failing field', () => {
    expect(() => parseYamlWithSchema('name: 3\n', UnitSchema)).toThrow(/YAML validation failed: name: /);
  });
});

describe('loadYamlWithSchema', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `stackweave-yaml-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('adds the file to error messages', async () => {
    const file = join(testDir, 'unit.yaml');
    await writeFile(file, 'count: 2\n');
    await expect(loadYamlWithSchema(file, UnitSchema)).rejects.toThrow(`(file: ${file})`);
  });

  it('reports missing files', async () => {
    const file = join(testDir, 'missing.yaml');
    await expect(loadYamlWithSchema(file, UnitSchema)).rejects.toThrow(`Failed to load YAML file: ${file}`);
  });
});

