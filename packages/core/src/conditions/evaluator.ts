// packages/core/src/conditions/evaluator.ts

import type { ComparisonOperator, CompiledCondition, ConditionNode } from '../types/workflow.js';
import { type DecisionValue, type Decisions, type ScalarLiteral, isDecisionMap } from '../types/values.js';
import type { Logger } from '../utils/logger.js';

/**
 * Host-supplied predicate addressable by name from a condition, e.g.
 * `quality_gate AND NOT blocked`. Receives the same scope as the expression.
 */
export type CustomCondition = (scope: Readonly<Decisions>) => boolean;

export interface EvaluateOptions {
  customConditions?: Readonly<Record<string, CustomCondition>>;
  logger?: Logger;
}

/**
 * Evaluate a compiled condition against a flat scope. Never throws:
 * missing keys read as null, mismatched comparisons are false.
 */
export function evaluateCondition(
  condition: CompiledCondition,
  scope: Readonly<Decisions>,
  options?: EvaluateOptions,
): boolean {
  return evaluateNode(condition.ast, scope, options);
}

function evaluateNode(node: ConditionNode, scope: Readonly<Decisions>, options?: EvaluateOptions): boolean {
  switch (node.kind) {
    case 'or':
      return node.operands.some((operand) => evaluateNode(operand, scope, options));
    case 'and':
      return node.operands.every((operand) => evaluateNode(operand, scope, options));
    case 'not':
      return !evaluateNode(node.operand, scope, options);
    case 'constant':
      return node.value;
    case 'compare':
      return compareValues(resolvePath(scope, node.path), node.operator, node.literal);
    case 'ref': {
      const custom = options?.customConditions;
      if (custom && Object.hasOwn(custom, node.path)) {
        return runCustomCondition(node.path, custom[node.path], scope, options?.logger);
      }
      return isTruthy(resolvePath(scope, node.path));
    }
  }
}

function runCustomCondition(
  name: string,
  predicate: CustomCondition,
  scope: Readonly<Decisions>,
  logger?: Logger,
): boolean {
  try {
    return predicate(scope) === true;
  } catch (err) {
    logger?.warn(
      `Custom condition "${name}" failed, treating as false: ${err instanceof Error ? err.message : String(err)}`,
    );
    return false;
  }
}

/**
 * Look up a key in the scope. An exact key wins; otherwise a dotted path walks
 * nested mappings (and numeric array indexes).
 */
export function resolvePath(scope: Readonly<Decisions>, path: string): DecisionValue | undefined {
  if (Object.hasOwn(scope, path)) {
    return scope[path];
  }
  if (!path.includes('.')) {
    return undefined;
  }

  let current: DecisionValue | undefined = { ...scope };
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isDecisionMap(current)) {
      current = Object.hasOwn(current, segment) ? current[segment] : undefined;
    } else {
      return undefined;
    }
  }
  return current;
}

export function isTruthy(value: DecisionValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

export function compareValues(
  value: DecisionValue | undefined,
  operator: ComparisonOperator,
  literal: ScalarLiteral,
): boolean {
  switch (operator) {
    case '==':
      return valuesEqual(value, literal);
    case '!=':
      return !valuesEqual(value, literal);
    default:
      return compareOrdered(value, operator, literal);
  }
}

function valuesEqual(value: DecisionValue | undefined, literal: ScalarLiteral): boolean {
  const left = value === undefined ? null : value;
  if (left === null || literal === null) return left === literal;
  if (typeof left === 'object') return false;
  return typeof left === typeof literal && left === literal;
}

function compareOrdered(
  value: DecisionValue | undefined,
  operator: Exclude<ComparisonOperator, '==' | '!='>,
  literal: ScalarLiteral,
): boolean {
  if (typeof value === 'number' && typeof literal === 'number') {
    return applyOrdering(value - literal, operator);
  }
  if (typeof value === 'string' && typeof literal === 'string') {
    return applyOrdering(value < literal ? -1 : value > literal ? 1 : 0, operator);
  }
  return false;
}

function applyOrdering(delta: number, operator: '>' | '<' | '>=' | '<='): boolean {
  switch (operator) {
    case '>':
      return delta > 0;
    case '<':
      return delta < 0;
    case '>=':
      return delta >= 0;
    case '<=':
      return delta <= 0;
  }
}
