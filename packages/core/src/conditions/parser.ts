// packages/core/src/conditions/parser.ts

import type { ComparisonOperator, CompiledCondition, ConditionNode } from '../types/workflow.js';
import type { ScalarLiteral } from '../types/values.js';
import { ConditionSyntaxError } from '../utils/errors.js';
import { type Token, tokenize } from './lexer.js';

const COMPARISON_OPERATORS: readonly string[] = ['==', '!=', '>', '<', '>=', '<='];

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.includes(value);
}

/**
 * Recursive-descent parser for the condition language.
 *
 *   expr       := term (OR term)*
 *   term       := factor (AND factor)*
 *   factor     := NOT factor | '(' expr ')' | comparison | identifier | boolean
 *   comparison := identifier op literal
 */
class ConditionParser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): ConditionNode {
    const node = this.parseExpr();
    const next = this.peek();
    if (next.type === 'rparen') {
      this.fail('Unbalanced parentheses: unexpected ")"', next);
    }
    if (next.type !== 'eof') {
      this.fail(`Unexpected token "${next.value}"`, next);
    }
    return node;
  }

  private parseExpr(): ConditionNode {
    const operands = [this.parseTerm()];
    while (this.peek().type === 'or') {
      this.advance();
      operands.push(this.parseTerm());
    }
    return operands.length === 1 ? operands[0] : { kind: 'or', operands };
  }

  private parseTerm(): ConditionNode {
    const operands = [this.parseFactor()];
    while (this.peek().type === 'and') {
      this.advance();
      operands.push(this.parseFactor());
    }
    return operands.length === 1 ? operands[0] : { kind: 'and', operands };
  }

  private parseFactor(): ConditionNode {
    const token = this.advance();

    switch (token.type) {
      case 'not':
        return { kind: 'not', operand: this.parseFactor() };

      case 'lparen': {
        const inner = this.parseExpr();
        const closing = this.peek();
        if (closing.type !== 'rparen') {
          this.fail('Unbalanced parentheses: expected ")"', closing);
        }
        this.advance();
        return inner;
      }

      case 'ident': {
        const next = this.peek();
        if (next.type === 'op' && isComparisonOperator(next.value)) {
          this.advance();
          return {
            kind: 'compare',
            path: token.value,
            operator: next.value,
            literal: this.parseLiteral(),
          };
        }
        return { kind: 'ref', path: token.value };
      }

      case 'true':
      case 'false':
        return { kind: 'constant', value: token.type === 'true' };

      case 'rparen':
        return this.fail('Unbalanced parentheses: unexpected ")"', token);

      case 'eof':
        return this.fail('Unexpected end of expression', token);

      case 'op':
        return this.fail(`Operator "${token.value}" must follow an identifier`, token);

      default:
        return this.fail(`Unexpected token "${token.value}"`, token);
    }
  }

  private parseLiteral(): ScalarLiteral {
    const token = this.advance();
    switch (token.type) {
      case 'string':
        return token.value;
      case 'number':
        return Number(token.value);
      case 'true':
        return true;
      case 'false':
        return false;
      case 'null':
        return null;
      default:
        return this.fail('Expected a literal after comparison operator', token);
    }
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private fail(message: string, token: Token): never {
    throw new ConditionSyntaxError(message, this.source, token.position);
  }
}

/**
 * Compile a condition expression. An empty expression compiles to `always`.
 * Throws ConditionSyntaxError on malformed input.
 */
export function compileCondition(source: string): CompiledCondition {
  const trimmed = source.trim();
  if (trimmed === '') {
    return { source: trimmed, ast: { kind: 'constant', value: true } };
  }
  const ast = new ConditionParser(trimmed, tokenize(trimmed)).parse();
  return { source: trimmed, ast };
}
