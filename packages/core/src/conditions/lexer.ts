// packages/core/src/conditions/lexer.ts

import { ConditionSyntaxError } from '../utils/errors.js';

export type TokenType =
  | 'ident'
  | 'number'
  | 'string'
  | 'true'
  | 'false'
  | 'null'
  | 'and'
  | 'or'
  | 'not'
  | 'lparen'
  | 'rparen'
  | 'op'
  | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}

/** Case-insensitive keywords. `always` / `never` are aliases for true / false. */
const KEYWORDS: Record<string, TokenType> = {
  and: 'and',
  or: 'or',
  not: 'not',
  true: 'true',
  false: 'false',
  null: 'null',
  always: 'true',
  never: 'false',
};

const IDENT_PATTERN = /[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/y;
const NUMBER_PATTERN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const OPERATORS = ['==', '!=', '>=', '<=', '>', '<'] as const;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', value: ch, position: pos });
      pos++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const { value, end } = readString(source, pos);
      tokens.push({ type: 'string', value, position: pos });
      pos = end;
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, pos));
    if (op) {
      tokens.push({ type: 'op', value: op, position: pos });
      pos += op.length;
      continue;
    }

    NUMBER_PATTERN.lastIndex = pos;
    const number = NUMBER_PATTERN.exec(source);
    if (number) {
      tokens.push({ type: 'number', value: number[0], position: pos });
      pos += number[0].length;
      continue;
    }

    IDENT_PATTERN.lastIndex = pos;
    const ident = IDENT_PATTERN.exec(source);
    if (ident) {
      const word = ident[0];
      const keyword = word.includes('.') ? undefined : KEYWORDS[word.toLowerCase()];
      tokens.push({ type: keyword ?? 'ident', value: word, position: pos });
      pos += word.length;
      continue;
    }

    if (ch === '=' || ch === '!') {
      throw new ConditionSyntaxError(`Unknown operator "${ch}"`, source, pos);
    }
    throw new ConditionSyntaxError(`Unexpected character "${ch}"`, source, pos);
  }

  tokens.push({ type: 'eof', value: '', position: source.length });
  return tokens;
}

function readString(source: string, start: number): { value: string; end: number } {
  const quote = source[start];
  let value = '';
  let pos = start + 1;

  while (pos < source.length) {
    const ch = source[pos];
    if (ch === '\\' && pos + 1 < source.length) {
      value += source[pos + 1];
      pos += 2;
      continue;
    }
    if (ch === quote) {
      return { value, end: pos + 1 };
    }
    value += ch;
    pos++;
  }

  throw new ConditionSyntaxError('Unterminated string literal', source, start);
}
