/**
 * Tests for filter evaluation against a stack.
 */
import { describe, it, expect, vi, type Mock } from 'vitest';
import { FilterEngine } from '../../../../src/core/filter/engine.js';
import type { ChangedFilesProvider } from '../../../../src/core/filter/types.js';
import { InvalidFilterSyntaxError } from '../../../../src/utils/errors.js';
import { chainStack, makeStack } from '../../../helpers/stack.js';

type ChangedFiles = (from: string, to?: string) => Promise<string[]>;

function fakeChanges(files: string[]): { changedFiles: Mock<ChangedFiles> } {
  return { changedFiles: vi.fn<ChangedFiles>(async () => files) };
}

async function select(filters: string[], changes: ChangedFilesProvider = fakeChanges([])) {
  const result = await new FilterEngine(chainStack(), { changedFiles: changes }).evaluate(filters);
  return { selected: [...result.selected], excluded: [...result.excluded] };
}

describe('FilterEngine', () => {
  it('selects everything without filters', async () => {
    expect(await select([])).toEqual({ selected: ['vpc', 'db', 'api', 'cache'], excluded: [] });
  });

  it('adds transitive dependencies with a trailing ...', async () => {
    expect((await select(['api...'])).selected).toEqual(['vpc', 'db', 'api']);
  });

  it('adds transitive dependents with a leading ...', async () => {
    expect((await select(['...vpc'])).selected).toEqual(['vpc', 'db', 'api']);
  });

  it('excludes with a negative filter', async () => {
    expect(await select(['!db'])).toEqual({ selected: ['vpc', 'api', 'cache'], excluded: ['db'] });
  });

  it('intersects operands joined with |', async () => {
    expect((await select(['api... | !vpc'])).selected).toEqual(['db', 'api']);
  });

  it('unions positive filters, then applies negative ones', async () => {
    expect(await select(['vpc', 'cache', '!cache'])).toEqual({ selected: ['vpc'], excluded: ['cache'] });
  });

  it('matches globs against names and paths', async () => {
    expect((await select(['c*'])).selected).toEqual(['cache']);
  });

  it('yields an empty selection for unmatched filters', async () => {
    expect(await select(['nothing'])).toEqual({ selected: [], excluded: [] });
  });

  it('matches prefixes on unit paths', async () => {
    const stack = makeStack({
      units: [
        { name: 'vpc', path: 'net/vpc', source: 's' },
        { name: 'dns', path: 'net/dns', source: 's' },
        { name: 'db', path: 'data/db', source: 's' },
        { name: 'netmon', path: 'network-monitor', source: 's' },
      ],
    });
    const result = await new FilterEngine(stack, { changedFiles: fakeChanges([]) }).evaluate(['net/']);
    expect([...result.selected]).toEqual(['vpc', 'dns']);
  });

  describe('git selectors', () => {
    it('matches units whose local source changed', async () => {
      const changes = fakeChanges(['../catalog/db/main.tf', '../README.md']);
      expect((await select(['[main...HEAD]'], changes)).selected).toEqual(['db']);
      expect(changes.changedFiles).toHaveBeenCalledWith('main', 'HEAD');
    });

    it('matches every unit when the stack file changed', async () => {
      expect((await select(['[HEAD~1]'], fakeChanges(['stack.yaml']))).selected).toEqual(['vpc', 'db', 'api', 'cache']);
    });

    it('combines with dependents', async () => {
      expect((await select(['...[main]'], fakeChanges(['../catalog/vpc/vars.tf']))).selected).toEqual([
        'vpc', 'db', 'api',
      ]);
    });

    it('asks git once per range', async () => {
      const changes = fakeChanges([]);
      await select(['[main]', '[main] | vpc'], changes);
      expect(changes.changedFiles).toHaveBeenCalledTimes(1);
    });
  });

  it('parses every filter before consulting git', async () => {
    const changes = fakeChanges([]);
    await expect(select(['[main]', 'a b'], changes)).rejects.toThrow(InvalidFilterSyntaxError);
    expect(changes.changedFiles).not.toHaveBeenCalled();
  });
});
