/**
 * Tests for filter expression parsing.
 */
import { describe, it, expect } from 'vitest';
import { parseFilter } from '../../../../src/core/filter/parser.js';
import { InvalidFilterSyntaxError } from '../../../../src/utils/errors.js';

function columnOf(expression: string): number | undefined {
  try {
    parseFilter(expression);
  } catch (error) {
    if (error instanceof InvalidFilterSyntaxError) return error.column;
    throw error;
  }
  return undefined;
}

describe('parseFilter', () => {
  it('parses a plain path', () => {
    expect(parseFilter('./net/vpc').operands).toEqual([
      {
        text: './net/vpc',
        target: { kind: 'path', value: 'net/vpc' },
        negated: false,
        withDependents: false,
        withDependencies: false,
      },
    ]);
  });

  it('parses dependency and dependent markers', () => {
    const [both] = parseFilter('...db...').operands;
    expect(both.target).toEqual({ kind: 'path', value: 'db' });
    expect(both.withDependents).toBe(true);
    expect(both.withDependencies).toBe(true);
  });

  it('parses negation', () => {
    const filter = parseFilter('!...db');
    expect(filter.negative).toBe(true);
    expect(filter.operands[0]).toMatchObject({ negated: true, withDependents: true, target: { kind: 'path', value: 'db' } });
  });

  it('distinguishes globs and prefixes', () => {
    expect(parseFilter('net/*').operands[0].target).toEqual({ kind: 'glob', pattern: 'net/*' });
    expect(parseFilter('net/').operands[0].target).toEqual({ kind: 'prefix', prefix: 'net' });
  });

  it('parses git selectors', () => {
    expect(parseFilter('[main]').operands[0].target).toEqual({ kind: 'git', from: 'main' });
    const [operand] = parseFilter('[main...HEAD]...').operands;
    expect(operand.target).toEqual({ kind: 'git', from: 'main', to: 'HEAD' });
    expect(operand.withDependencies).toBe(true);
  });

  it('splits intersections on |', () => {
    const filter = parseFilter('api... | !vpc');
    expect(filter.operands.map((o) => o.text)).toEqual(['api...', '!vpc']);
    expect(filter.negative).toBe(false);
  });

  describe('errors', () => {
    it('reports the column of the problem', () => {
      expect(columnOf('')).toBe(1);
      expect(columnOf('a||b')).toBe(3);
      expect(columnOf('a...b')).toBe(2);
      expect(columnOf('a b')).toBe(2);
      expect(columnOf('[main')).toBe(1);
      expect(columnOf('db | !')).toBe(7);
    });

    it('explains the problem', () => {
      expect(() => parseFilter('a||b')).toThrow("Invalid filter 'a||b' at column 3: empty operand");
      expect(() => parseFilter('[a...b...c]')).toThrow('git selector must be [ref] or [from...to]');
    });
  });
});
