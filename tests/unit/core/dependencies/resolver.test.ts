/**
 * Tests for dependency output resolution.
 */
import { describe, it, expect } from 'vitest';
import {
  DependencyResolver,
  selectOutput,
  substituteReferences,
} from '../../../../src/core/dependencies/resolver.js';
import { MemoryOutputStore } from '../../../../src/core/dependencies/output-store.js';
import { NULL_VALUE, fromPlain, fromPlainMap, mapValue, stringValue } from '../../../../src/core/values/convert.js';
import type { RefValue } from '../../../../src/core/values/types.js';
import { UnresolvedDependencyError } from '../../../../src/utils/errors.js';
import { chainStack, makeStack } from '../../../helpers/stack.js';

describe('selectOutput', () => {
  const ref: RefValue = { kind: 'ref', path: '../acm', target: 'acm', key: 'cert' };

  it('prefers an explicit output name', () => {
    const outputs = fromPlainMap({ arn: 'arn-1', cert: 'c' });
    expect(selectOutput({ ...ref, output: 'arn' }, outputs, 'acm')).toEqual(stringValue('arn-1'));
  });

  it('falls back to the output named like the enclosing key', () => {
    expect(selectOutput(ref, fromPlainMap({ arn: 'a', cert: 'c' }), 'acm')).toEqual(stringValue('c'));
  });

  it('uses the sole output', () => {
    expect(selectOutput(ref, fromPlainMap({ arn: 'X' }), 'acm')).toEqual(stringValue('X'));
  });

  it('returns the whole mapping otherwise', () => {
    expect(selectOutput(ref, fromPlainMap({ a: 1, b: 2 }), 'acm')).toEqual(fromPlain({ a: 1, b: 2 }));
  });

  it('returns null without outputs', () => {
    expect(selectOutput(ref, null, 'acm')).toEqual(NULL_VALUE);
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(() => selectOutput({ ...ref, output: 'constructor' }, fromPlainMap({ id: 'x' }), 'acm')).toThrow(
      UnresolvedDependencyError
    );
    expect(selectOutput({ ...ref, key: 'toString' }, fromPlainMap({ id: 'x' }), 'acm')).toEqual(stringValue('x'));
  });

  it('rejects a missing explicit output', () => {
    expect(() => selectOutput({ ...ref, output: 'arn' }, fromPlainMap({ id: 'x' }), 'acm')).toThrow(
      "Unit 'acm' has no output named 'arn'"
    );
  });
});

describe('substituteReferences', () => {
  it('is idempotent', () => {
    const value = mapValue({
      cert: { kind: 'ref', path: '../acm', target: 'acm', key: 'cert' },
      other: { kind: 'ref', path: '../vpc', target: 'vpc', key: 'other' },
    });
    const outputs = fromPlainMap({ arn: 'X' });

    const once = substituteReferences(value, 'acm', outputs);
    const twice = substituteReferences(once, 'acm', outputs);

    expect(once).toEqual(mapValue({
      cert: stringValue('X'),
      other: { kind: 'ref', path: '../vpc', target: 'vpc', key: 'other' },
    }));
    expect(twice).toEqual(once);
  });
});

describe('DependencyResolver', () => {
  it('uses mock outputs for plan when the provider has not been applied', async () => {
    const resolver = new DependencyResolver(chainStack(), new MemoryOutputStore());
    const resolved = await resolver.resolveUnit('db', 'plan');

    expect(resolved.values).toEqual({ vpc_id: stringValue('mock-vpc') });
    expect(resolved.dependencies.map((d) => [d.target, d.source])).toEqual([['vpc', 'mock']]);
  });

  it('refuses mocks for apply', async () => {
    const resolver = new DependencyResolver(chainStack(), new MemoryOutputStore());
    await expect(resolver.resolveUnit('db', 'apply')).rejects.toThrow(
      "Unit 'db' depends on 'vpc', which has not been applied; mock outputs are only allowed for validate, plan (action: apply)"
    );
  });

  it('prefers real outputs over mocks', async () => {
    const store = new MemoryOutputStore({ vpc: fromPlainMap({ vpc_id: 'vpc-123', cidr: '10.0.0.0/16' }) });
    const resolver = new DependencyResolver(chainStack(), store);

    const resolved = await resolver.resolveUnit('db', 'apply');
    expect(resolved.values.vpc_id).toEqual(stringValue('vpc-123'));
    expect(resolved.dependencies[0].source).toBe('outputs');
  });

  it('reports a missing dependency without mocks', async () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', source: 's' },
        { name: 'db', source: 's', values: { vpc_id: '../vpc' } },
      ],
    });
    const resolver = new DependencyResolver(stack, new MemoryOutputStore());
    await expect(resolver.resolveUnit('db', 'plan')).rejects.toThrow(UnresolvedDependencyError);
    await expect(resolver.resolveUnit('db', 'plan')).rejects.toThrow('no mock outputs are defined (action: plan)');
  });

  it('honors custom mock actions', async () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', source: 's' },
        {
          name: 'db',
          source: 's',
          values: { vpc_id: '../vpc' },
          dependencies: { vpc: { mock_outputs: { vpc_id: 'm' }, mock_outputs_allowed_actions: ['destroy'] } },
        },
      ],
    });
    const resolver = new DependencyResolver(stack, new MemoryOutputStore());
    await expect(resolver.resolveUnit('db', 'plan')).rejects.toThrow('only allowed for destroy');
    expect((await resolver.resolveUnit('db', 'destroy')).values.vpc_id).toEqual(stringValue('m'));
  });

  it('turns references over disabled edges into null', async () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', source: 's' },
        { name: 'db', source: 's', values: { vpc_id: '../vpc' }, dependencies: { vpc: { enabled: false } } },
      ],
    });
    const resolver = new DependencyResolver(stack, new MemoryOutputStore({ vpc: fromPlainMap({ vpc_id: 'real' }) }));
    const resolved = await resolver.resolveUnit('db', 'apply');
    expect(resolved.values.vpc_id).toEqual(NULL_VALUE);
    expect(resolved.dependencies[0].source).toBe('disabled');
  });

  it('never reads real outputs over skip_outputs edges', async () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', source: 's' },
        {
          name: 'db',
          source: 's',
          values: { vpc_id: '../vpc' },
          dependencies: { vpc: { skip_outputs: true, mock_outputs: { vpc_id: 'placeholder' } } },
        },
      ],
    });
    const resolver = new DependencyResolver(stack, new MemoryOutputStore({ vpc: fromPlainMap({ vpc_id: 'real' }) }));
    const resolved = await resolver.resolveUnit('db', 'apply');
    expect(resolved.values.vpc_id).toEqual(stringValue('placeholder'));
    expect(resolved.dependencies[0].source).toBe('skipped');
  });

  it('resolves skip_outputs edges without mocks against an empty mapping', async () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', source: 's' },
        { name: 'db', source: 's', values: { vpc_id: '../vpc' }, dependencies: { vpc: { skip_outputs: true } } },
      ],
    });
    const resolver = new DependencyResolver(stack, new MemoryOutputStore({ vpc: fromPlainMap({ vpc_id: 'real' }) }));
    const resolved = await resolver.resolveUnit('db', 'apply');
    expect(resolved.values.vpc_id).toEqual(mapValue({}));
    expect(resolved.dependencies[0].source).toBe('skipped');
    expect(resolved.dependencies[0].outputs).toEqual({});
  });

  it('rejects an explicit output over a skip_outputs edge without mocks', async () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', source: 's' },
        {
          name: 'db',
          source: 's',
          values: { vpc_id: { $ref: '../vpc', output: 'id' } },
          dependencies: { vpc: { skip_outputs: true } },
        },
      ],
    });
    const resolver = new DependencyResolver(stack, new MemoryOutputStore());
    await expect(resolver.resolveUnit('db', 'plan')).rejects.toThrow("Unit 'vpc' has no output named 'id'");
  });
});
