// packages/core/src/types/workflow.ts

import type { ScalarLiteral } from './values.js';

/**
 * Raw workflow as written in YAML (snake_case keys). The loader validates this
 * shape and compiles it into a WorkflowDefinition.
 */
export interface RawWorkflow {
  name: string;
  description?: string;
  initial_message: string;
  max_turns: number;
  agents: RawAgent[];
  states: RawState[];
  exit_conditions?: RawExitCondition[];
}

export interface RawAgent {
  name: string;
  type: AgentType;
}

export interface RawState {
  name: string;
  agent: string;
  start?: boolean;
  prompt: string;
  transitions?: RawTransition[];
}

export interface RawTransition {
  to: string;
  condition?: string;
}

export interface RawExitCondition {
  condition: string;
  action: ExitAction;
}

export type AgentType = 'coder' | 'architect' | 'ask';

export type ExitAction = 'force_end' | 'save_and_end';

export type ComparisonOperator = '==' | '!=' | '>' | '<' | '>=' | '<=';

export type ConditionNode =
  | { kind: 'or'; operands: ConditionNode[] }
  | { kind: 'and'; operands: ConditionNode[] }
  | { kind: 'not'; operand: ConditionNode }
  | { kind: 'compare'; path: string; operator: ComparisonOperator; literal: ScalarLiteral }
  | { kind: 'ref'; path: string }
  | { kind: 'constant'; value: boolean };

export interface CompiledCondition {
  source: string;
  ast: ConditionNode;
}

export type TemplateSegment =
  | { kind: 'text'; text: string }
  | { kind: 'var'; name: string }
  | {
      kind: 'if';
      name: string;
      literal: string;
      then: TemplateSegment[];
      otherwise: TemplateSegment[];
    };

export interface CompiledTemplate {
  source: string;
  segments: TemplateSegment[];
}

export interface AgentSpec {
  readonly name: string;
  readonly type: AgentType;
}

export interface Transition {
  /** Target state name, or END. */
  readonly to: string;
  readonly condition: CompiledCondition;
}

export interface StateSpec {
  readonly name: string;
  readonly agent: string;
  readonly start: boolean;
  readonly prompt: CompiledTemplate;
  readonly transitions: readonly Transition[];
}

export interface ExitConditionSpec {
  readonly condition: CompiledCondition;
  readonly action: ExitAction;
}

/**
 * Validated, frozen workflow. States are looked up by name through `stateIndex`,
 * so cycles between states need no object references.
 */
export interface WorkflowDefinition {
  readonly name: string;
  readonly description: string;
  readonly initialMessage: string;
  readonly maxTurns: number;
  readonly agents: readonly AgentSpec[];
  readonly states: readonly StateSpec[];
  readonly exitConditions: readonly ExitConditionSpec[];
  readonly startState: string;
  readonly stateIndex: ReadonlyMap<string, StateSpec>;
  readonly agentIndex: ReadonlyMap<string, AgentSpec>;
}
