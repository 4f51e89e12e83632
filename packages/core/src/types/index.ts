// packages/core/src/types/index.ts -- barrel re-export

export type { AgentCommandConfig, EngineConfig, ProjectConfig } from './config.js';

export type {
  AgentSpec,
  AgentType,
  ComparisonOperator,
  CompiledCondition,
  CompiledTemplate,
  ConditionNode,
  ExitAction,
  ExitConditionSpec,
  RawAgent,
  RawExitCondition,
  RawState,
  RawTransition,
  RawWorkflow,
  StateSpec,
  TemplateSegment,
  Transition,
  WorkflowDefinition,
} from './workflow.js';

export type {
  EngineEvent,
  ExitTriggeredEvent,
  SessionCompletedEvent,
  SessionFailedEvent,
  SessionStartedEvent,
  TemplateNoteEvent,
  TransitionTakenEvent,
  TurnCompletedEvent,
  TurnStartedEvent,
} from './events.js';

export type {
  PersistedSession,
  RunOutcome,
  SessionStatus,
  SessionSummary,
  TurnRecord,
  WorkspaceHandle,
} from './session.js';

export type { AgentProxy, AgentReply, AgentRequest } from './agents.js';

export type { DecisionValue, Decisions, ScalarLiteral } from './values.js';
export { isDecisionMap } from './values.js';
