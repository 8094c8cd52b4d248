/**
 * `${...}` interpolation for locals, unit values and settings templates.
 *
 * Supported forms inside `${ }`:
 *   - dotted references: `config.env`, `local.tags.team`, `unit.name`
 *   - literals: "text", 'text', 42, true, false, null
 *   - function calls: merge(a, b), lower(s), upper(s), coalesce(a, b), join(sep, list)
 *
 * `$${` escapes a literal `${`. A string made of exactly one interpolation
 * keeps the type of its result; anything else is rendered to a string.
 */
import { ExpressionError } from '../../utils/errors.js';
import type { Value, ValueMap } from '../values/types.js';
import {
  stringValue,
  numberValue,
  boolValue,
  listValue,
  mapValue,
  NULL_VALUE,
  lookupPath,
} from '../values/convert.js';
import { mergeDeep } from '../values/merge.js';

/** Names visible to expressions, e.g. { config, local, unit }. */
export type Scope = Record<string, Value>;

type Segment = { type: 'text'; text: string } | { type: 'expr'; source: string; offset: number };

const IDENT_PATTERN = /[A-Za-z_][\w-]*/y;
const NUMBER_PATTERN = /-?\d+(?:\.\d+)?/y;
const INDEX_PATTERN = /\d+/y;

/**
 * Split a template into literal text and expression sources.
 */
function splitTemplate(template: string): Segment[] {
  const segments: Segment[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    if (template.startsWith('$${', i)) {
      text += '${';
      i += 3;
      continue;
    }
    if (!template.startsWith('${', i)) {
      text += template[i];
      i++;
      continue;
    }

    const start = i + 2;
    let j = start;
    let quote: string | null = null;
    while (j < template.length) {
      const ch = template[j];
      if (quote) {
        if (ch === '\\') j++;
        else if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === '}') {
        break;
      }
      j++;
    }
    if (j >= template.length) {
      throw new ExpressionError(`Unterminated interpolation in '${template}'`, { template, offset: i });
    }

    if (text) {
      segments.push({ type: 'text', text });
      text = '';
    }
    segments.push({ type: 'expr', source: template.slice(start, j), offset: start });
    i = j + 1;
  }

  if (text) {
    segments.push({ type: 'text', text });
  }
  return segments;
}

/**
 * Recursive-descent parser/evaluator for a single expression.
 */
class ExpressionParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly scope: Scope
  ) {}

  evaluate(): Value {
    const value = this.parseExpression();
    this.skipWhitespace();
    if (this.pos < this.source.length) {
      this.fail(`unexpected '${this.source[this.pos]}'`);
    }
    return value;
  }

  private parseExpression(): Value {
    this.skipWhitespace();
    const ch = this.source[this.pos];

    if (ch === '"' || ch === "'") {
      return stringValue(this.parseString(ch));
    }

    NUMBER_PATTERN.lastIndex = this.pos;
    const number = NUMBER_PATTERN.exec(this.source);
    if (number) {
      this.pos += number[0].length;
      return numberValue(Number(number[0]));
    }

    const ident = this.parseIdent();
    this.skipWhitespace();

    if (this.source[this.pos] === '(') {
      this.pos++;
      return callFunction(ident, this.parseArguments(), this.source);
    }

    switch (ident) {
      case 'true':
        return boolValue(true);
      case 'false':
        return boolValue(false);
      case 'null':
        return NULL_VALUE;
      default:
        return this.parseReference(ident);
    }
  }

  private parseReference(root: string): Value {
    const segments: string[] = [];
    while (this.source[this.pos] === '.') {
      this.pos++;
      INDEX_PATTERN.lastIndex = this.pos;
      const numeric = INDEX_PATTERN.exec(this.source);
      if (numeric) {
        segments.push(numeric[0]);
        this.pos += numeric[0].length;
      } else {
        segments.push(this.parseIdent());
      }
    }

    const base = Object.prototype.hasOwnProperty.call(this.scope, root) ? this.scope[root] : undefined;
    const found = base ? lookupPath(base, segments) : undefined;
    if (!found) {
      const name = [root, ...segments].join('.');
      throw new ExpressionError(`Unknown reference '${name}'`, { reference: name, expression: this.source });
    }
    return found;
  }

  private parseArguments(): Value[] {
    const args: Value[] = [];
    this.skipWhitespace();
    if (this.source[this.pos] === ')') {
      this.pos++;
      return args;
    }
    for (;;) {
      args.push(this.parseExpression());
      this.skipWhitespace();
      const ch = this.source[this.pos];
      if (ch === ',') {
        this.pos++;
        continue;
      }
      if (ch === ')') {
        this.pos++;
        return args;
      }
      this.fail("expected ',' or ')'");
    }
  }

  private parseString(quote: string): string {
    let result = '';
    this.pos++;
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === '\\' && this.pos + 1 < this.source.length) {
        result += this.source[this.pos + 1];
        this.pos += 2;
        continue;
      }
      if (ch === quote) {
        this.pos++;
        return result;
      }
      result += ch;
      this.pos++;
    }
    return this.fail('unterminated string');
  }

  private parseIdent(): string {
    IDENT_PATTERN.lastIndex = this.pos;
    const match = IDENT_PATTERN.exec(this.source);
    if (!match) {
      return this.fail(
        this.pos < this.source.length ? `unexpected '${this.source[this.pos]}'` : 'unexpected end of expression'
      );
    }
    this.pos += match[0].length;
    return match[0];
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) {
      this.pos++;
    }
  }

  private fail(reason: string): never {
    throw new ExpressionError(`Invalid expression '${this.source}': ${reason}`, {
      expression: this.source,
      position: this.pos,
    });
  }
}

function callFunction(name: string, args: Value[], source: string): Value {
  switch (name) {
    case 'merge': {
      const maps: ValueMap[] = args.map((arg, i) => {
        if (arg.kind === 'null') return {};
        if (arg.kind !== 'map') {
          throw new ExpressionError(`merge() argument ${i + 1} is a ${arg.kind}, expected a mapping`, { expression: source });
        }
        return arg.entries;
      });
      return mapValue(mergeDeep(maps));
    }
    case 'lower':
    case 'upper': {
      const [arg] = args;
      if (args.length !== 1 || arg.kind !== 'string') {
        throw new ExpressionError(`${name}() takes one string argument`, { expression: source });
      }
      return stringValue(name === 'lower' ? arg.value.toLowerCase() : arg.value.toUpperCase());
    }
    case 'coalesce': {
      const found = args.find((arg) => arg.kind !== 'null' && !(arg.kind === 'string' && arg.value === ''));
      return found ?? NULL_VALUE;
    }
    case 'join': {
      const [separator, list] = args;
      if (args.length !== 2 || separator.kind !== 'string' || list.kind !== 'list') {
        throw new ExpressionError('join() takes a separator string and a list', { expression: source });
      }
      return stringValue(list.items.map((item) => renderScalar(item, source)).join(separator.value));
    }
    default:
      throw new ExpressionError(`Unknown function '${name}'`, { function: name, expression: source });
  }
}

function renderScalar(value: Value, source: string): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'number':
    case 'bool':
      return String(value.value);
    default:
      throw new ExpressionError(`Cannot render a ${value.kind} into a string`, { expression: source });
  }
}

/**
 * Evaluate a single expression (the text between `${` and `}`).
 */
export function evaluateExpression(source: string, scope: Scope): Value {
  return new ExpressionParser(source, scope).evaluate();
}

/**
 * Evaluate a template string.
 */
export function evaluateTemplate(template: string, scope: Scope): Value {
  if (!template.includes('${')) {
    return stringValue(template);
  }

  const segments = splitTemplate(template);
  if (segments.length === 1 && segments[0].type === 'expr') {
    return evaluateExpression(segments[0].source, scope);
  }

  const rendered = segments
    .map((segment) =>
      segment.type === 'text'
        ? segment.text
        : renderScalar(evaluateExpression(segment.source, scope), segment.source)
    )
    .join('');
  return stringValue(rendered);
}

/**
 * Evaluate every string inside a value. References are left untouched.
 */
export function evaluateValue(value: Value, scope: Scope): Value {
  switch (value.kind) {
    case 'string':
      return evaluateTemplate(value.value, scope);
    case 'list':
      return listValue(value.items.map((item) => evaluateValue(item, scope)));
    case 'map': {
      const entries: ValueMap = {};
      for (const [key, item] of Object.entries(value.entries)) {
        entries[key] = evaluateValue(item, scope);
      }
      return mapValue(entries);
    }
    default:
      return value;
  }
}

/**
 * Evaluate a template that must produce a string (paths, sources, bucket names).
 */
export function evaluateString(template: string, scope: Scope, what: string): string {
  const result = evaluateTemplate(template, scope);
  if (result.kind === 'string') return result.value;
  if (result.kind === 'number' || result.kind === 'bool') return String(result.value);
  throw new ExpressionError(`${what} must evaluate to a string, got ${result.kind}`, { template });
}
