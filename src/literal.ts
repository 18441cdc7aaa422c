/**
 * Conversion between JSON values and CheckMK rule literals
 *
 * CheckMK stores rule values (`value_raw`) as literal text: sequences are
 * tuples, strings are single-quoted, and the constants are spelled True,
 * False and None.
 *
 * Round trips are lossy in two cases. A tagged numeric pair and a plain
 * array of two numbers both serialize to `(a, b)`, and both parse back to a
 * two-element array. A string that is already a literal passes through
 * unquoted, so `{flag: 'True'}` reads back as `{flag: true}`. Callers that
 * need the original shape must keep `value_raw`.
 */

import { LITERAL } from './constants.js';
import type { JsonValue, LiteralValue } from './types.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when a value has no literal form (NaN, Infinity)
 */
export class LiteralEncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LiteralEncodeError';
  }
}

/**
 * Raised when literal text is malformed
 */
export class LiteralParseError extends Error {
  /** Offset into the source text where the problem was found */
  readonly offset: number;
  readonly expected: string;
  readonly found: string;

  constructor(offset: number, expected: string, found: string, context?: string) {
    const prefix = context ? `${context}: ` : '';
    super(`${prefix}expected ${expected} but found ${found} at offset ${offset}`);
    this.name = 'LiteralParseError';
    this.offset = offset;
    this.expected = expected;
    this.found = found;
  }
}

// ============================================================================
// JSON -> Literal
// ============================================================================

/** Strings starting like this may already be literals */
const PREFORMATTED = /^(?:[{([]|(?:True|False|None)(?![A-Za-z0-9_]))/;

const STRING_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * True when a string is already a complete literal and can be emitted
 * verbatim. Text that only starts like one, such as `[critical] disk`, is not.
 */
export function isPreformattedLiteral(value: string): boolean {
  if (!PREFORMATTED.test(value.trim())) {
    return false;
  }
  try {
    parseLiteral(value);
    return true;
  } catch (error) {
    if (error instanceof LiteralParseError) {
      return false;
    }
    throw error;
  }
}

/**
 * Build the literal tree for a JSON value.
 *
 * Two-element sequences get special handling, checked in this order:
 * `[string, sequence]` becomes a tagged tuple whose tag is always quoted,
 * and `[number, number]` becomes a numeric pair. Everything else becomes a
 * tuple of converted elements.
 */
export function fromJson(value: JsonValue): LiteralValue {
  if (value === null) {
    return { kind: 'none' };
  }
  if (Array.isArray(value)) {
    return fromSequence(value);
  }
  if (typeof value === 'boolean') {
    return { kind: 'bool', value };
  }
  if (typeof value === 'number') {
    return fromNumber(value);
  }
  if (typeof value === 'string') {
    return isPreformattedLiteral(value)
      ? { kind: 'raw', text: value }
      : { kind: 'string', value };
  }
  return {
    kind: 'mapping',
    entries: Object.entries(value).map(([key, item]) => [key, fromJson(item)]),
  };
}

function fromSequence(items: JsonValue[]): LiteralValue {
  if (items.length === 2) {
    const [first, second] = items;
    if (typeof first === 'string' && Array.isArray(second)) {
      return {
        kind: 'tuple',
        items: [{ kind: 'string', value: first }, fromSequence(second)],
      };
    }
    if (typeof first === 'number' && typeof second === 'number') {
      return { kind: 'tuple', items: [fromNumber(first), fromNumber(second)] };
    }
  }
  return { kind: 'tuple', items: items.map(fromJson) };
}

function fromNumber(value: number): LiteralValue {
  if (!Number.isFinite(value)) {
    throw new LiteralEncodeError(`Cannot express ${value} as a literal`);
  }
  return Number.isInteger(value)
    ? { kind: 'int', value }
    : { kind: 'float', value };
}

/**
 * Render a literal tree as text
 */
export function formatLiteral(node: LiteralValue): string {
  switch (node.kind) {
    case 'mapping':
      return `{${node.entries
        .map(([key, item]) => `${quoteString(key)}: ${formatLiteral(item)}`)
        .join(', ')}}`;
    case 'tuple':
      // (x,) is a one-tuple; (x) would just be x
      return node.items.length === 1
        ? `(${formatLiteral(node.items[0])},)`
        : `(${node.items.map(formatLiteral).join(', ')})`;
    case 'list':
      return `[${node.items.map(formatLiteral).join(', ')}]`;
    case 'string':
      return quoteString(node.value);
    case 'raw':
      return node.text;
    case 'int':
      return Number.isSafeInteger(node.value)
        ? String(node.value)
        : BigInt(node.value).toString();
    case 'float':
      return formatFloat(node.value);
    case 'bool':
      return node.value ? LITERAL.TRUE : LITERAL.FALSE;
    case 'none':
      return LITERAL.NONE;
  }
}

function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw new LiteralEncodeError(`Cannot express ${value} as a literal`);
  }
  const text = String(value);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

// Other control characters are written as \xNN
function escapeChar(ch: string): string {
  return STRING_ESCAPES[ch] ?? `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`;
}

function quoteString(value: string): string {
  return `'${value.replace(/[\\'\x00-\x1f\x7f]/g, escapeChar)}'`;
}

/**
 * Convert a JSON value to CheckMK literal text.
 *
 * @example
 * toLiteral({ levels: ['perc_used', [90.5, 95.5]] })
 * // "{'levels': ('perc_used', (90.5, 95.5))}"
 */
export function toLiteral(value: JsonValue): string {
  return formatLiteral(fromJson(value));
}

// ============================================================================
// Literal -> JSON
// ============================================================================

type Punctuation = '{' | '}' | '(' | ')' | '[' | ']' | ',' | ':';
type Keyword = typeof LITERAL[keyof typeof LITERAL];

type Token =
  | { type: 'punct'; value: Punctuation; offset: number }
  | { type: 'string'; value: string; offset: number }
  | { type: 'number'; value: number; isFloat: boolean; text: string; offset: number }
  | { type: 'keyword'; value: Keyword; offset: number }
  | { type: 'end'; offset: number };

const PUNCTUATION = new Set<string>(['{', '}', '(', ')', '[', ']', ',', ':']);
const NUMBER = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;

const GROUPS = {
  '{': { name: 'mapping', close: '}' },
  '(': { name: 'tuple', close: ')' },
  '[': { name: 'list', close: ']' },
} as const;

type Opener = keyof typeof GROUPS;

function isPunctuation(ch: string): ch is Punctuation {
  return PUNCTUATION.has(ch);
}

function isKeyword(word: string): word is Keyword {
  return word === LITERAL.TRUE || word === LITERAL.FALSE || word === LITERAL.NONE;
}

function describe(token: Token): string {
  switch (token.type) {
    case 'end':
      return 'end of input';
    case 'punct':
      return `'${token.value}'`;
    case 'string':
      return `string ${quoteString(token.value)}`;
    case 'number':
      return token.text;
    case 'keyword':
      return token.value;
  }
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (isPunctuation(ch)) {
      tokens.push({ type: 'punct', value: ch, offset: pos });
      pos++;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const { value, end } = readString(text, pos);
      tokens.push({ type: 'string', value, offset: pos });
      pos = end;
      continue;
    }

    NUMBER.lastIndex = pos;
    const number = NUMBER.exec(text);
    if (number) {
      const numberText = number[0];
      tokens.push({
        type: 'number',
        value: Number(numberText),
        isFloat: /[.eE]/.test(numberText),
        text: numberText,
        offset: pos,
      });
      pos += numberText.length;
      continue;
    }

    IDENTIFIER.lastIndex = pos;
    const identifier = IDENTIFIER.exec(text);
    if (identifier) {
      const word = identifier[0];
      if (!isKeyword(word)) {
        throw new LiteralParseError(pos, 'a literal', `'${word}'`, 'Unknown token');
      }
      tokens.push({ type: 'keyword', value: word, offset: pos });
      pos += word.length;
      continue;
    }

    throw new LiteralParseError(pos, 'a literal', `'${ch}'`, 'Unexpected character');
  }

  tokens.push({ type: 'end', offset: text.length });
  return tokens;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
};

function readString(text: string, start: number): { value: string; end: number } {
  const quote = text[start];
  let value = '';
  let pos = start + 1;

  while (pos < text.length) {
    const ch = text[pos];
    if (ch === quote) {
      return { value, end: pos + 1 };
    }
    if (ch === '\n') {
      break;
    }
    if (ch !== '\\') {
      value += ch;
      pos++;
      continue;
    }

    const escape = text[pos + 1];
    if (escape === undefined) {
      break;
    }
    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      value += simple;
      pos += 2;
    } else if (escape === 'x' || escape === 'u') {
      const width = escape === 'x' ? 2 : 4;
      const hex = text.slice(pos + 2, pos + 2 + width);
      if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) {
        throw new LiteralParseError(pos, `${width} hex digits after \\${escape}`, `'${hex}'`, 'Invalid escape');
      }
      value += String.fromCharCode(parseInt(hex, 16));
      pos += 2 + width;
    } else if (escape === '\n') {
      pos += 2;
    } else {
      // Unknown escapes keep their backslash
      value += `\\${escape}`;
      pos += 2;
    }
  }

  const found = pos < text.length ? 'end of line' : 'end of input';
  throw new LiteralParseError(pos, `closing ${quote}`, found, `Unterminated string opened at offset ${start}`);
}

class LiteralParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parseDocument(): LiteralValue {
    const value = this.parseValue();
    const trailing = this.peek();
    if (trailing.type !== 'end') {
      throw new LiteralParseError(trailing.offset, 'end of input', describe(trailing));
    }
    return value;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'end') {
      this.index++;
    }
    return token;
  }

  private accept(value: Punctuation): boolean {
    const token = this.peek();
    if (token.type === 'punct' && token.value === value) {
      this.index++;
      return true;
    }
    return false;
  }

  private parseValue(): LiteralValue {
    const token = this.next();
    switch (token.type) {
      case 'string':
        return { kind: 'string', value: token.value };
      case 'number':
        return token.isFloat
          ? { kind: 'float', value: token.value }
          : { kind: 'int', value: token.value };
      case 'keyword':
        if (token.value === LITERAL.NONE) {
          return { kind: 'none' };
        }
        return { kind: 'bool', value: token.value === LITERAL.TRUE };
      case 'punct':
        if (token.value === '{') {
          return this.parseMapping(token.offset);
        }
        if (token.value === '(' || token.value === '[') {
          return this.parseSequence(token.value, token.offset);
        }
        break;
      case 'end':
        break;
    }
    throw new LiteralParseError(token.offset, 'a value', describe(token));
  }

  /**
   * Error for a token that neither continues nor closes the open group
   */
  private unexpected(opener: Opener, openedAt: number, expected: string): LiteralParseError {
    const token = this.peek();
    const context =
      token.type === 'end'
        ? `Unterminated ${GROUPS[opener].name} opened at offset ${openedAt}`
        : undefined;
    return new LiteralParseError(token.offset, expected, describe(token), context);
  }

  private parseSequence(opener: '(' | '[', openedAt: number): LiteralValue {
    const close = GROUPS[opener].close;
    const items: LiteralValue[] = [];
    let sawComma = false;

    while (!this.accept(close)) {
      if (this.peek().type === 'end') {
        throw this.unexpected(opener, openedAt, `a value or '${close}'`);
      }
      items.push(this.parseValue());
      if (this.accept(',')) {
        sawComma = true;
        continue;
      }
      if (!this.accept(close)) {
        throw this.unexpected(opener, openedAt, `',' or '${close}'`);
      }
      break;
    }

    if (opener === '[') {
      return { kind: 'list', items };
    }
    // (x) is a parenthesized value, (x,) a one-tuple
    if (items.length === 1 && !sawComma) {
      return items[0];
    }
    return { kind: 'tuple', items };
  }

  private parseMapping(openedAt: number): LiteralValue {
    const entries: Array<[string, LiteralValue]> = [];

    while (!this.accept('}')) {
      const key = this.peek();
      if (key.type === 'end') {
        throw this.unexpected('{', openedAt, "a string key or '}'");
      }
      if (key.type !== 'string') {
        throw new LiteralParseError(key.offset, 'a string key', describe(key));
      }
      this.next();
      if (!this.accept(':')) {
        throw this.unexpected('{', openedAt, "':'");
      }
      if (this.peek().type === 'end') {
        throw this.unexpected('{', openedAt, 'a value');
      }
      const value = this.parseValue();

      // Later duplicates overwrite the value but keep the first position
      const existing = entries.findIndex(([name]) => name === key.value);
      if (existing >= 0) {
        entries[existing] = [key.value, value];
      } else {
        entries.push([key.value, value]);
      }

      if (this.accept(',')) {
        continue;
      }
      if (!this.accept('}')) {
        throw this.unexpected('{', openedAt, "',' or '}'");
      }
      break;
    }

    return { kind: 'mapping', entries };
  }
}

/**
 * Parse CheckMK literal text into a literal tree
 *
 * @throws LiteralParseError when the text is malformed
 */
export function parseLiteral(text: string): LiteralValue {
  return new LiteralParser(tokenize(text)).parseDocument();
}

/**
 * Map a literal tree onto JSON. Tuples and lists both become arrays.
 */
export function toJson(node: LiteralValue): JsonValue {
  switch (node.kind) {
    case 'mapping':
      return Object.fromEntries(
        node.entries.map(([key, item]) => [key, toJson(item)])
      );
    case 'tuple':
    case 'list':
      return node.items.map(toJson);
    case 'string':
      return node.value;
    case 'raw':
      return fromLiteral(node.text);
    case 'int':
    case 'float':
      return node.value;
    case 'bool':
      return node.value;
    case 'none':
      return null;
  }
}

/**
 * Parse CheckMK literal text into a JSON value
 *
 * @throws LiteralParseError when the text is malformed
 */
export function fromLiteral(text: string): JsonValue {
  return toJson(parseLiteral(text));
}
