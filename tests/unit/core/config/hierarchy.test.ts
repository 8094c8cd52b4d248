/**
 * Tests for the directory-walk configuration hierarchy.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadHierarchy, mergeFragments } from '../../../../src/core/config/hierarchy.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { fromPlain, fromPlainMap } from '../../../../src/core/values/convert.js';
import { ConfigError, ConfigNotFoundError } from '../../../../src/utils/errors.js';

const settings = getDefaultConfig().hierarchy;

describe('loadHierarchy', () => {
  let testDir: string;

  async function put(relative: string, content: string): Promise<void> {
    const file = join(testDir, relative);
    await mkdir(join(file, '..'), { recursive: true });
    await writeFile(file, content);
  }

  beforeEach(async () => {
    testDir = join(tmpdir(), `stackweave-hierarchy-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('merges root, account, region and environment with the closest level winning', async () => {
    await put('root.yaml', 'org: acme\nenv: root-env\ntags:\n  a: 1\n');
    await put('prod/account.yaml', 'account_name: prod-acct\ntags:\n  b: 2\n');
    await put('prod/us-east-1/region.yaml', 'region: us-east-1\n');
    await put('prod/us-east-1/dev/env.yaml', 'env: dev\n');
    const start = join(testDir, 'prod/us-east-1/dev/stack');
    await mkdir(start, { recursive: true });

    const config = await loadHierarchy(start, settings);

    expect(config.rootDir).toBe(testDir);
    expect(config.fragments.map((f) => f.level)).toEqual(['root', 'account', 'region', 'environment']);
    expect(config.fragments[1].file).toBe(join(testDir, 'prod/account.yaml'));
    expect(config.values).toEqual(
      fromPlainMap({
        org: 'acme',
        env: 'dev',
        tags: { b: 2 },
        account_name: 'prod-acct',
        region: 'us-east-1',
      })
    );
  });

  it('takes the nearest file when a level appears twice', async () => {
    await put('root.yaml', '');
    await put('account.yaml', 'account_name: outer\n');
    await put('team/account.yaml', 'account_name: inner\n');
    const config = await loadHierarchy(join(testDir, 'team'), settings);
    expect(config.values.account_name).toEqual(fromPlain('inner'));
  });

  it('records absent optional levels as empty fragments', async () => {
    await put('root.yaml', '');
    await put('account.yaml', 'account_name: solo\n');
    const config = await loadHierarchy(testDir, settings);
    expect(config.fragments[2]).toEqual({ level: 'region', file: null, values: {} });
  });

  it('stops at the root marker', async () => {
    await put('account.yaml', 'account_name: above-root\n');
    await put('inner/root.yaml', 'org: acme\n');
    await mkdir(join(testDir, 'inner/stack'), { recursive: true });

    await expect(loadHierarchy(join(testDir, 'inner/stack'), settings)).rejects.toThrow(ConfigNotFoundError);
  });

  it('rejects a file that is not a mapping', async () => {
    await put('root.yaml', '');
    await put('account.yaml', '- a\n- b\n');
    await expect(loadHierarchy(testDir, settings)).rejects.toThrow(ConfigError);
  });
});

describe('mergeFragments', () => {
  it('lets later fragments override earlier ones for the same key', () => {
    const merged = mergeFragments([
      { level: 'root', file: null, values: fromPlainMap({ k: 'root', only_root: 1 }) },
      { level: 'account', file: null, values: fromPlainMap({ k: 'account' }) },
      { level: 'environment', file: null, values: fromPlainMap({ k: 'env' }) },
    ]);
    expect(merged).toEqual(fromPlainMap({ k: 'env', only_root: 1 }));
  });
});
