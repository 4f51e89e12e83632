// @baton/core - Turn-based multi-agent workflow engine
// Workflow loading, condition language, prompt templates, runner, SQLite sessions

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  AgentCommandConfig,
  EngineConfig,
  ProjectConfig,
  // Workflow
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
  // Events
  EngineEvent,
  ExitTriggeredEvent,
  SessionCompletedEvent,
  SessionFailedEvent,
  SessionStartedEvent,
  TemplateNoteEvent,
  TransitionTakenEvent,
  TurnCompletedEvent,
  TurnStartedEvent,
  // Session
  PersistedSession,
  RunOutcome,
  SessionStatus,
  SessionSummary,
  TurnRecord,
  WorkspaceHandle,
  // Agents
  AgentProxy,
  AgentReply,
  AgentRequest,
  // Values
  DecisionValue,
  Decisions,
  ScalarLiteral,
} from './types/index.js';
export { isDecisionMap } from './types/index.js';

// Utilities
export {
  generateSessionId,
  AgentError,
  ConditionSyntaxError,
  ConfigError,
  DatabaseError,
  ResponseFormatError,
  TemplateSyntaxError,
  ValidationError,
  WorkflowError,
  createLogger,
  silentLogger,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  CONFIG_FILENAME,
  DEFAULT_AGENT_TIMEOUT_SEC,
  END_STATE,
  MAX_AGENT_OUTPUT_BYTES,
  RESPONSE_PREVIEW_CHARS,
  STATE_DIRNAME,
} from './utils/constants.js';

// Configuration
export { DEFAULT_CONFIG, deepMerge, loadConfig, projectConfigSchema, validateConfig, writeConfig } from './config/index.js';
export type { ConfigOverrides, ProjectConfigInput } from './config/index.js';

// Conditions
export { compareValues, compileCondition, evaluateCondition, isTruthy, resolvePath, tokenize } from './conditions/index.js';
export type { CustomCondition, EvaluateOptions, Token, TokenType } from './conditions/index.js';

// Templates
export { DEFAULT_COLLABORATION_GUIDE, PromptRenderer, compileTemplate, formatValue } from './templates/index.js';
export type { PromptRendererOptions, RenderResult } from './templates/index.js';

// Memory / Database
export {
  openDatabase,
  runMigrations,
  getSchemaVersion,
  SessionStore,
  fromSessionJson,
  parseSessionJson,
  sessionJsonSchema,
  sessionStatusSchema,
  toSessionJson,
} from './memory/index.js';
export type { SessionJson, SessionListFilter } from './memory/index.js';

// Agent proxies
export { CliAgentProxy, ScriptedAgentProxy, buildFilteredEnv, killProcessTree } from './agents/index.js';
export type { CliAgentProxyOptions, ScriptedResponse } from './agents/index.js';

// Engine (Loading + Execution)
export {
  CancellationError,
  CancellationToken,
  EventBus,
  ExecutionContext,
  WorkflowLoader,
  WorkflowRunner,
  decisionValueSchema,
  decisionsSchema,
  extractControlBlock,
  rawWorkflowSchema,
} from './engine/index.js';
export type {
  ControlBlock,
  ExecutionContextOptions,
  ResumeOptions,
  RunFailure,
  RunOptions,
  RunResult,
  SessionPersistence,
  TurnInput,
  WorkflowLoaderOptions,
  WorkflowRunnerOptions,
} from './engine/index.js';
