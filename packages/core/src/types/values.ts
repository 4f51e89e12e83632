// packages/core/src/types/values.ts

/**
 * Any value an agent may return under `decisions`. Closed over JSON:
 * comparison and truthiness rules are defined per variant in the evaluator.
 */
export type DecisionValue =
  | null
  | boolean
  | number
  | string
  | DecisionValue[]
  | { [key: string]: DecisionValue };

export type Decisions = Record<string, DecisionValue>;

/** Literal allowed on the right-hand side of a comparison. */
export type ScalarLiteral = null | boolean | number | string;

export function isDecisionMap(value: DecisionValue | undefined): value is { [key: string]: DecisionValue } {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
