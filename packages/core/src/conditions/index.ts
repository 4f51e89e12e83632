// packages/core/src/conditions -- Condition expression language

export { tokenize } from './lexer.js';
export type { Token, TokenType } from './lexer.js';
export { compileCondition } from './parser.js';
export { compareValues, evaluateCondition, isTruthy, resolvePath } from './evaluator.js';
export type { CustomCondition, EvaluateOptions } from './evaluator.js';
