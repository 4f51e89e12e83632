import { describe, expect, it } from 'vitest';
import { tokenize } from '../../../src/conditions/lexer.js';
import { compileCondition } from '../../../src/conditions/parser.js';
import { ConditionSyntaxError } from '../../../src/utils/errors.js';

describe('tokenize', () => {
  it('splits operators, keywords and literals', () => {
    const types = tokenize('score >= 8 OR NOT approved').map((t) => t.type);
    expect(types).toEqual(['ident', 'op', 'number', 'or', 'not', 'ident', 'eof']);
  });

  it('treats keywords case-insensitively', () => {
    const types = tokenize('a and b Or NoT c').map((t) => t.type);
    expect(types).toEqual(['ident', 'and', 'ident', 'or', 'not', 'ident', 'eof']);
  });

  it('maps always/never to boolean tokens', () => {
    expect(tokenize('always')[0].type).toBe('true');
    expect(tokenize('NEVER')[0].type).toBe('false');
  });

  it('never reads a dotted identifier as a keyword', () => {
    expect(tokenize('review.and')[0]).toEqual({ type: 'ident', value: 'review.and', position: 0 });
  });

  it('reads quoted strings with escapes', () => {
    expect(tokenize('"say \\"hi\\""')[0]).toEqual({ type: 'string', value: 'say "hi"', position: 0 });
    expect(tokenize("'single'")[0].value).toBe('single');
  });

  it('reads negative and decimal numbers', () => {
    expect(tokenize('-2.5')[0]).toEqual({ type: 'number', value: '-2.5', position: 0 });
  });

  it('rejects an unterminated string', () => {
    expect(() => tokenize('status == "open')).toThrow('Unterminated string literal at position 10');
  });
});

describe('compileCondition', () => {
  it('compiles an empty condition to always', () => {
    expect(compileCondition('   ')).toEqual({ source: '', ast: { kind: 'constant', value: true } });
  });

  it('keeps the trimmed source', () => {
    expect(compileCondition('  approved ').source).toBe('approved');
  });

  it('gives AND higher precedence than OR', () => {
    const { ast } = compileCondition('a OR b AND c');
    expect(ast).toEqual({
      kind: 'or',
      operands: [
        { kind: 'ref', path: 'a' },
        {
          kind: 'and',
          operands: [
            { kind: 'ref', path: 'b' },
            { kind: 'ref', path: 'c' },
          ],
        },
      ],
    });
  });

  it('lets parentheses override precedence', () => {
    const { ast } = compileCondition('(a OR b) AND c');
    expect(ast).toEqual({
      kind: 'and',
      operands: [
        {
          kind: 'or',
          operands: [
            { kind: 'ref', path: 'a' },
            { kind: 'ref', path: 'b' },
          ],
        },
        { kind: 'ref', path: 'c' },
      ],
    });
  });

  it('parses comparisons with every literal kind', () => {
    expect(compileCondition('score >= 8').ast).toEqual({ kind: 'compare', path: 'score', operator: '>=', literal: 8 });
    expect(compileCondition("status == 'done'").ast).toEqual({
      kind: 'compare',
      path: 'status',
      operator: '==',
      literal: 'done',
    });
    expect(compileCondition('ok != FALSE').ast).toEqual({ kind: 'compare', path: 'ok', operator: '!=', literal: false });
    expect(compileCondition('owner == null').ast).toEqual({ kind: 'compare', path: 'owner', operator: '==', literal: null });
  });

  it('parses nested NOT', () => {
    expect(compileCondition('NOT NOT a').ast).toEqual({
      kind: 'not',
      operand: { kind: 'not', operand: { kind: 'ref', path: 'a' } },
    });
  });

  it.each([
    ['(a AND b', 'Unbalanced parentheses: expected ")" at position 8'],
    ['a AND b)', 'Unbalanced parentheses: unexpected ")" at position 7'],
    ['a = 1', 'Unknown operator "=" at position 2'],
    ['a AND', 'Unexpected end of expression at position 5'],
    ['a b', 'Unexpected token "b" at position 2'],
    ['a == b', 'Expected a literal after comparison operator at position 5'],
    ['score @ 3', 'Unexpected character "@" at position 6'],
    ['>= 3', 'Operator ">=" must follow an identifier at position 0'],
  ])('rejects %s', (source, message) => {
    expect(() => compileCondition(source)).toThrow(ConditionSyntaxError);
    expect(() => compileCondition(source)).toThrow(message);
  });

  it('records the expression on the error', () => {
    try {
      compileCondition('a AND (b');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConditionSyntaxError);
      if (err instanceof ConditionSyntaxError) {
        expect(err.expression).toBe('a AND (b');
        expect(err.position).toBe(8);
      }
    }
  });
});
