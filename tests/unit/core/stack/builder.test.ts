/**
 * Tests for stack expansion and graph building.
 */
import { describe, it, expect } from 'vitest';
import { normalizeUnitPath, resolveRelative } from '../../../../src/core/stack/builder.js';
import { fromPlain, stringValue } from '../../../../src/core/values/convert.js';
import {
  CyclicDependencyError,
  DuplicateUnitNameError,
  DuplicateUnitPathError,
  InvalidSourceError,
  StackError,
  UnknownDependencyError,
} from '../../../../src/utils/errors.js';
import { chainStack, makeStack } from '../../../helpers/stack.js';

describe('buildStack', () => {
  it('detects references to sibling units and creates edges', () => {
    const stack = chainStack();

    expect([...stack.units.keys()]).toEqual(['vpc', 'db', 'api', 'cache']);
    expect(stack.units.get('db')?.values.vpc_id).toEqual({
      kind: 'ref',
      path: '../vpc',
      target: 'vpc',
      key: 'vpc_id',
    });
    expect(stack.graph.getEdge('db', 'vpc')?.origin).toBe('both');
    expect(stack.graph.dependenciesOf('api')).toEqual(['db']);
    expect(stack.graph.topologicalOrder()).toEqual(['vpc', 'db', 'api', 'cache']);
  });

  it('evaluates locals, config and unit scope', () => {
    const stack = makeStack(
      {
        locals: { prefix: '${config.env}-app', tags: { env: '${config.env}' } },
        units: [
          {
            name: 'api',
            path: 'services/${unit.name}',
            source: '../catalog/${unit.name}',
            values: { name: '${local.prefix}-${unit.name}', where: '${unit.path}', tags: '${local.tags}' },
          },
        ],
      },
      { env: 'dev' }
    );

    const api = stack.units.get('api');
    expect(api?.path).toBe('services/api');
    expect(api?.source.location).toBe('../catalog/api');
    expect(api?.values).toEqual({
      name: stringValue('dev-app-api'),
      where: stringValue('services/api'),
      tags: fromPlain({ env: 'dev' }),
    });
  });

  it('lets later locals read earlier ones', () => {
    const stack = makeStack({ locals: { a: 'x', b: '${local.a}y' }, units: [] });
    expect(stack.locals.b).toEqual(stringValue('xy'));
  });

  it('keeps skip_references and unrelated relative paths as strings', () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', source: 's' },
        {
          name: 'db',
          source: 's',
          values: { docs: '../vpc', script: './scripts/run.sh' },
          skip_references: ['../vpc'],
        },
      ],
    });

    expect(stack.units.get('db')?.values).toEqual({
      docs: stringValue('../vpc'),
      script: stringValue('./scripts/run.sh'),
    });
    expect(stack.graph.edges()).toEqual([]);
  });

  it('builds explicit references with an output name', () => {
    const stack = makeStack({
      units: [
        { name: 'acm', path: 'net/acm', source: 's' },
        { name: 'lb', path: 'net/lb', source: 's', values: { cert: { $ref: '../acm', output: 'arn' } } },
      ],
    });
    expect(stack.units.get('lb')?.values.cert).toEqual({
      kind: 'ref', path: '../acm', target: 'net/acm', output: 'arn', key: 'cert',
    });
    expect(stack.graph.getEdge('lb', 'acm')?.origin).toBe('reference');
  });

  it('evaluates dependency flags', () => {
    const stack = makeStack(
      {
        units: [
          { name: 'vpc', source: 's' },
          {
            name: 'db',
            source: 's',
            dependencies: { vpc: { enabled: '${config.use_vpc}', skip_outputs: true } },
          },
        ],
      },
      { use_vpc: false }
    );
    const edge = stack.graph.getEdge('db', 'vpc');
    expect(edge?.enabled).toBe(false);
    expect(edge?.skipOutputs).toBe(true);
    expect(edge?.origin).toBe('declared');
    expect(edge?.mockAllowedActions).toEqual(['validate', 'plan']);
  });

  it('resolves dependency blocks by path', () => {
    const stack = makeStack({
      units: [
        { name: 'network', path: 'net/vpc', source: 's' },
        { name: 'db', path: 'data/db', source: 's', dependencies: { network: { path: '../../net/vpc' } } },
      ],
    });
    expect(stack.graph.dependenciesOf('db')).toEqual(['network']);
  });

  describe('structural errors', () => {
    it('rejects duplicate names', () => {
      expect(() => makeStack({ units: [{ name: 'a', source: 's' }, { name: 'a', source: 's' }] })).toThrow(
        DuplicateUnitNameError
      );
    });

    it('rejects duplicate paths', () => {
      expect(() =>
        makeStack({ units: [{ name: 'a', path: 'x', source: 's' }, { name: 'b', path: './x/', source: 's' }] })
      ).toThrow("Units 'a' and 'b' in stack 'live' share the path 'x'");
    });

    it('rejects unknown dependencies', () => {
      expect(() =>
        makeStack({ units: [{ name: 'a', source: 's', dependencies: { ghost: {} } }] })
      ).toThrow(UnknownDependencyError);
    });

    it('rejects explicit references to unknown units', () => {
      expect(() =>
        makeStack({ units: [{ name: 'a', source: 's', values: { x: { $ref: '../ghost' } } }] })
      ).toThrow(UnknownDependencyError);
    });

    it('rejects cycles', () => {
      expect(() =>
        makeStack({
          units: [
            { name: 'a', source: 's', values: { b: '../b' } },
            { name: 'b', source: 's', values: { a: '../a' } },
          ],
        })
      ).toThrow(CyclicDependencyError);
    });

    it('rejects malformed sources', () => {
      expect(() => makeStack({ units: [{ name: 'a', source: 'git::https://h/r.git?ref=v1//m' }] })).toThrow(
        InvalidSourceError
      );
    });

    it('rejects non-boolean flags', () => {
      expect(() =>
        makeStack({
          units: [
            { name: 'a', source: 's' },
            { name: 'b', source: 's', dependencies: { a: { enabled: 'maybe' } } },
          ],
        })
      ).toThrow(StackError);
    });
  });
});

describe('paths', () => {
  it('normalizeUnitPath cleans and bounds paths', () => {
    expect(normalizeUnitPath('./net//vpc/', 'vpc')).toBe('net/vpc');
    expect(() => normalizeUnitPath('../outside', 'x')).toThrow(StackError);
    expect(() => normalizeUnitPath('/abs', 'x')).toThrow(StackError);
  });

  it('resolveRelative resolves against the unit path', () => {
    expect(resolveRelative('networking/vpc', '../acm')).toBe('networking/acm');
    expect(resolveRelative('db', '../vpc')).toBe('vpc');
  });
});
