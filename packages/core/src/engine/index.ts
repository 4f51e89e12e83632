// packages/core/src/engine -- Workflow loading and execution

export { CancellationError, CancellationToken } from './cancellation.js';
export { EventBus } from './event-bus.js';
export { ExecutionContext } from './execution-context.js';
export type { ExecutionContextOptions, TurnInput } from './execution-context.js';
export { decisionsSchema, decisionValueSchema, extractControlBlock } from './response-parser.js';
export type { ControlBlock } from './response-parser.js';
export { WorkflowLoader, rawWorkflowSchema } from './workflow-loader.js';
export type { WorkflowLoaderOptions } from './workflow-loader.js';
export { WorkflowRunner } from './workflow-runner.js';
export type {
  ResumeOptions,
  RunFailure,
  RunOptions,
  RunResult,
  SessionPersistence,
  WorkflowRunnerOptions,
} from './workflow-runner.js';
