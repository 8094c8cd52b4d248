import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadStack, loadStackDefinition } from '../../../../src/core/stack/loader.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { StackDefinitionError } from '../../../../src/utils/errors.js';

describe('stack loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `stackweave-stack-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, 'live'), { recursive: true });
    await writeFile(join(testDir, 'root.yaml'), 'env: prod\n');
    await writeFile(join(testDir, 'account.yaml'), 'account_name: acme\n');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('builds the stack against the hierarchy above it', async () => {
    const file = join(testDir, 'live/stack.yaml');
    await writeFile(
      file,
      'locals:\n  prefix: ${config.env}-web\nunits:\n  - name: acm\n    source: ../catalog/acm\n    values:\n      domain: ${local.prefix}.example.com\n'
    );

    const stack = await loadStack(file, getDefaultConfig().hierarchy);

    expect(stack.name).toBe('live');
    expect(stack.dir).toBe(join(testDir, 'live'));
    expect(stack.units.get('acm')?.values.domain).toEqual({ kind: 'string', value: 'prod-web.example.com' });
  });

  it('reports a missing stack file', async () => {
    const file = join(testDir, 'live/stack.yaml');
    await expect(loadStackDefinition(file)).rejects.toThrow(`Invalid stack definition ${file}: file not found`);
  });

  it('rejects definitions that do not match the schema', async () => {
    const file = join(testDir, 'live/stack.yaml');
    await writeFile(file, 'units:\n  - source: ../catalog/acm\n');
    await expect(loadStackDefinition(file)).rejects.toBeInstanceOf(StackDefinitionError);
  });
});
