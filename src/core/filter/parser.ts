/**
 * Filter expression parser.
 *
 *   filter   := operand ('|' operand)*
 *   operand  := ['!'] ['...'] target ['...']
 *   target   := path | prefix/ | glob | '[' ref ['...' ref] ']'
 *
 * A target starting with '[' is always a git selector; globs may use
 * character classes elsewhere (`units/[ab]*`).
 */
import { InvalidFilterSyntaxError } from '../../utils/errors.js';
import type { FilterExpression, FilterOperand, FilterTarget } from './types.js';

const ELLIPSIS = '...';
const GLOB_CHARS = /[*?[\]{}]/;
const FORBIDDEN_CHARS = /[\s!|]/;

interface Slice {
  text: string;
  /** 0-based offset of text[0] within the full expression */
  offset: number;
}

function trimSlice(slice: Slice): Slice {
  const leading = slice.text.length - slice.text.trimStart().length;
  return { text: slice.text.trim(), offset: slice.offset + leading };
}

/**
 * Split on top-level '|' (outside git brackets).
 */
function splitOperands(source: string): Slice[] {
  const slices: Slice[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === '[') depth++;
    else if (ch === ']') depth = Math.max(0, depth - 1);
    else if (ch === '|' && depth === 0) {
      slices.push({ text: source.slice(start, i), offset: start });
      start = i + 1;
    }
  }
  slices.push({ text: source.slice(start), offset: start });
  return slices;
}

function normalizePath(text: string): string {
  return text.replace(/^\.\//, '').replace(/\/+$/, '');
}

function parseGitTarget(source: string, slice: Slice): FilterTarget {
  if (!slice.text.endsWith(']')) {
    throw new InvalidFilterSyntaxError(source, slice.offset + 1, "unclosed '['");
  }
  const inner = slice.text.slice(1, -1).trim();
  if (!inner) {
    throw new InvalidFilterSyntaxError(source, slice.offset + 1, 'empty git selector');
  }
  const parts = inner.split(ELLIPSIS);
  if (parts.length > 2 || parts.some((p) => !p.trim())) {
    throw new InvalidFilterSyntaxError(source, slice.offset + 2, `git selector must be [ref] or [from...to], got '[${inner}]'`);
  }
  for (const part of parts) {
    const bad = part.trim().search(/[\s[\]]/);
    if (bad >= 0) {
      throw new InvalidFilterSyntaxError(source, slice.offset + 2, `invalid character in git ref '${part.trim()}'`);
    }
  }
  return parts.length === 2
    ? { kind: 'git', from: parts[0].trim(), to: parts[1].trim() }
    : { kind: 'git', from: parts[0].trim() };
}

function parseTarget(source: string, slice: Slice): FilterTarget {
  const { text, offset } = slice;
  if (!text) {
    throw new InvalidFilterSyntaxError(source, offset + 1, 'missing unit path or pattern');
  }
  if (text.startsWith('[')) {
    return parseGitTarget(source, slice);
  }

  const forbidden = text.search(FORBIDDEN_CHARS);
  if (forbidden >= 0) {
    throw new InvalidFilterSyntaxError(source, offset + forbidden + 1, `unexpected '${text[forbidden]}'`);
  }
  const ellipsis = text.indexOf(ELLIPSIS);
  if (ellipsis >= 0) {
    throw new InvalidFilterSyntaxError(source, offset + ellipsis + 1, "'...' is only allowed at the start or end of an operand");
  }

  if (GLOB_CHARS.test(text)) {
    return { kind: 'glob', pattern: text.replace(/^\.\//, '') };
  }
  if (text.endsWith('/')) {
    const prefix = normalizePath(text);
    if (!prefix) {
      throw new InvalidFilterSyntaxError(source, offset + 1, 'empty prefix');
    }
    return { kind: 'prefix', prefix };
  }
  const value = normalizePath(text);
  if (!value) {
    throw new InvalidFilterSyntaxError(source, offset + 1, 'missing unit path or pattern');
  }
  return { kind: 'path', value };
}

function parseOperand(source: string, raw: Slice): FilterOperand {
  let slice = trimSlice(raw);
  if (!slice.text) {
    throw new InvalidFilterSyntaxError(source, slice.offset + 1, 'empty operand');
  }
  const text = slice.text;

  let negated = false;
  if (slice.text.startsWith('!')) {
    negated = true;
    slice = trimSlice({ text: slice.text.slice(1), offset: slice.offset + 1 });
  }

  let withDependents = false;
  if (slice.text.startsWith(ELLIPSIS)) {
    withDependents = true;
    slice = { text: slice.text.slice(ELLIPSIS.length), offset: slice.offset + ELLIPSIS.length };
  }

  let withDependencies = false;
  if (slice.text.endsWith(ELLIPSIS) && !slice.text.startsWith('[')) {
    withDependencies = true;
    slice = { text: slice.text.slice(0, -ELLIPSIS.length), offset: slice.offset };
  } else if (slice.text.startsWith('[') && /\]\.\.\.$/.test(slice.text)) {
    withDependencies = true;
    slice = { text: slice.text.slice(0, -ELLIPSIS.length), offset: slice.offset };
  }

  return {
    text,
    target: parseTarget(source, slice),
    negated,
    withDependents,
    withDependencies,
  };
}

/**
 * Parse one filter expression.
 *
 * @throws InvalidFilterSyntaxError on malformed input
 */
export function parseFilter(source: string): FilterExpression {
  if (!source.trim()) {
    throw new InvalidFilterSyntaxError(source, 1, 'empty filter');
  }
  const operands = splitOperands(source).map((slice) => parseOperand(source, slice));
  return {
    source,
    operands,
    negative: operands.every((op) => op.negated),
  };
}
