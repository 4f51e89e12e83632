import { describe, expect, it, vi } from 'vitest';
import { compareValues, evaluateCondition, isTruthy, resolvePath } from '../../../src/conditions/evaluator.js';
import { compileCondition } from '../../../src/conditions/parser.js';
import type { Decisions } from '../../../src/types/values.js';
import type { Logger } from '../../../src/utils/logger.js';

function check(source: string, scope: Decisions): boolean {
  return evaluateCondition(compileCondition(source), scope);
}

describe('evaluateCondition', () => {
  it('evaluates A AND NOT B', () => {
    expect(check('A AND NOT B', { A: true, B: false })).toBe(true);
    expect(check('A AND NOT B', { A: true, B: true })).toBe(false);
  });

  it('evaluates score >= 8 OR approved', () => {
    expect(check('score >= 8 OR approved', { score: 5, approved: true })).toBe(true);
    expect(check('score >= 8 OR approved', { score: 5, approved: false })).toBe(false);
    expect(check('score >= 8 OR approved', { score: 9 })).toBe(true);
  });

  it('changes outcome with parentheses', () => {
    const scope = { A: true, B: false, C: false };
    expect(check('(A OR B) AND C', scope)).toBe(false);
    expect(check('A OR (B AND C)', scope)).toBe(true);
  });

  it('treats a missing identifier as false', () => {
    expect(check('unknown_flag', {})).toBe(false);
    expect(check('NOT unknown_flag', {})).toBe(true);
  });

  it('compares a missing identifier as null', () => {
    expect(check('status == null', {})).toBe(true);
    expect(check('status == "open"', {})).toBe(false);
    expect(check('status != "open"', {})).toBe(true);
    expect(check('score > 3', {})).toBe(false);
    expect(check('score <= 3', {})).toBe(false);
  });

  it('never coerces between types', () => {
    expect(check('score == "5"', { score: 5 })).toBe(false);
    expect(check('score != "5"', { score: 5 })).toBe(true);
    expect(check('score > "3"', { score: 5 })).toBe(false);
    expect(check('flag == 1', { flag: true })).toBe(false);
  });

  it('compares strings lexicographically', () => {
    expect(check('phase < "m"', { phase: 'build' })).toBe(true);
    expect(check('phase >= "build"', { phase: 'build' })).toBe(true);
  });

  it('never equates collections with a literal', () => {
    expect(check('files == "a"', { files: ['a'] })).toBe(false);
    expect(check('files != "a"', { files: ['a'] })).toBe(true);
  });

  it('reads dotted paths through nested mappings', () => {
    const scope: Decisions = { review: { score: 9, tags: ['ok'] } };
    expect(check('review.score >= 8', scope)).toBe(true);
    expect(check('review.tags', scope)).toBe(true);
    expect(check('review.missing', scope)).toBe(false);
  });

  it('uses constants', () => {
    expect(check('always', {})).toBe(true);
    expect(check('never OR false', {})).toBe(false);
    expect(check('TRUE AND NOT never', {})).toBe(true);
  });

  it('calls custom conditions by name', () => {
    const gate = vi.fn((scope: Readonly<Decisions>) => scope.score === 10);
    const result = evaluateCondition(compileCondition('quality_gate AND NOT blocked'), { score: 10 }, {
      customConditions: { quality_gate: gate },
    });
    expect(result).toBe(true);
    expect(gate).toHaveBeenCalledTimes(1);
  });

  it('treats a throwing custom condition as false and logs it', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const result = evaluateCondition(compileCondition('broken'), {}, {
      customConditions: {
        broken: () => {
          throw new Error('boom');
        },
      },
      logger,
    });
    expect(result).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Custom condition "broken" failed, treating as false: boom');
  });
});

describe('isTruthy', () => {
  it.each([
    [true, true],
    [false, false],
    [0, false],
    [-1, true],
    ['', false],
    ['no', true],
    [[], false],
    [[0], true],
    [{}, false],
    [{ a: null }, true],
    [null, false],
    [undefined, false],
  ])('isTruthy(%j) is %s', (value, expected) => {
    expect(isTruthy(value)).toBe(expected);
  });
});

describe('resolvePath', () => {
  it('prefers an exact dotted key over walking', () => {
    expect(resolvePath({ 'a.b': 1, a: { b: 2 } }, 'a.b')).toBe(1);
  });

  it('walks array indexes', () => {
    expect(resolvePath({ items: ['x', 'y'] }, 'items.1')).toBe('y');
    expect(resolvePath({ items: ['x'] }, 'items.first')).toBeUndefined();
  });
});

describe('compareValues', () => {
  it('treats null == null as true', () => {
    expect(compareValues(null, '==', null)).toBe(true);
    expect(compareValues(undefined, '!=', null)).toBe(false);
  });

  it('rejects ordering on booleans', () => {
    expect(compareValues(true, '>', false)).toBe(false);
    expect(compareValues(true, '<=', true)).toBe(false);
  });
});
