// packages/core/src/engine/workflow-runner.ts

import type { CustomCondition, EvaluateOptions } from '../conditions/evaluator.js';
import { evaluateCondition } from '../conditions/evaluator.js';
import { PromptRenderer } from '../templates/renderer.js';
import type { AgentProxy, AgentReply, AgentRequest } from '../types/agents.js';
import type { PersistedSession, RunOutcome, TurnRecord, WorkspaceHandle } from '../types/session.js';
import type { Decisions } from '../types/values.js';
import type { WorkflowDefinition } from '../types/workflow.js';
import { DEFAULT_AGENT_TIMEOUT_SEC, END_STATE } from '../utils/constants.js';
import { AgentError, ResponseFormatError, WorkflowError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';
import { EventBus } from './event-bus.js';
import { ExecutionContext } from './execution-context.js';
import type { ControlBlock } from './response-parser.js';
import { extractControlBlock } from './response-parser.js';

/** Anything that can checkpoint a session (SessionStore, or a test double). */
export interface SessionPersistence {
  save(session: PersistedSession): void;
}

export interface WorkflowRunnerOptions {
  proxy: AgentProxy;
  eventBus?: EventBus;
  store?: SessionPersistence;
  logger?: Logger;
  collaborationGuide?: string;
  /** Per-turn limit on the agent call. */
  agentTimeoutMs?: number;
  customConditions?: Readonly<Record<string, CustomCondition>>;
  /** Save after every turn, not only when the run stops. Default true. */
  persistCheckpoints?: boolean;
}

export interface ResumeOptions {
  cancellation?: CancellationToken;
  collaborationGuide?: string;
}

export interface RunOptions extends ResumeOptions {
  workspace: WorkspaceHandle;
  sessionId?: string;
  initialMessage?: string;
}

export interface RunFailure {
  turn: number;
  message: string;
  rawResponse: string;
}

export interface RunResult {
  sessionId: string;
  outcome: RunOutcome;
  reason: string;
  turnCount: number;
  finalState: string;
  decisions: Decisions;
  history: TurnRecord[];
  /** Error recorded on the session: set by save_and_end exits and aborted turns, otherwise null. */
  sessionError: string | null;
  error?: RunFailure;
}

const RESUMABLE_STATUSES = new Set(['idle', 'running', 'paused']);

/**
 * Drives a workflow one turn at a time: exit conditions, prompt rendering,
 * agent call, control-block extraction, decision merge, transition.
 */
export class WorkflowRunner {
  readonly eventBus: EventBus;
  private readonly proxy: AgentProxy;
  private readonly store: SessionPersistence | undefined;
  private readonly logger: Logger;
  private readonly collaborationGuide: string | undefined;
  private readonly agentTimeoutMs: number;
  private readonly evaluateOptions: EvaluateOptions;
  private readonly persistCheckpoints: boolean;

  constructor(options: WorkflowRunnerOptions) {
    this.proxy = options.proxy;
    this.eventBus = options.eventBus ?? new EventBus();
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.collaborationGuide = options.collaborationGuide;
    this.agentTimeoutMs = options.agentTimeoutMs ?? DEFAULT_AGENT_TIMEOUT_SEC * 1000;
    this.evaluateOptions = { customConditions: options.customConditions, logger: this.logger };
    this.persistCheckpoints = options.persistCheckpoints ?? true;
  }

  /** Start a new session at the workflow's start state. */
  async run(workflow: WorkflowDefinition, options: RunOptions): Promise<RunResult> {
    const ctx = ExecutionContext.create(workflow, {
      workspace: options.workspace,
      sessionId: options.sessionId,
      initialMessage: options.initialMessage,
    });
    return this.drive(ctx, false, options);
  }

  /** Continue a running or paused session from its current state. */
  async resume(
    workflow: WorkflowDefinition,
    persisted: PersistedSession,
    options: ResumeOptions = {},
  ): Promise<RunResult> {
    if (!RESUMABLE_STATUSES.has(persisted.status)) {
      throw new WorkflowError(
        `Session ${persisted.sessionId} is ${persisted.status} and cannot be resumed`,
        persisted.currentState,
      );
    }
    const ctx = ExecutionContext.restore(workflow, persisted);
    return this.drive(ctx, true, options);
  }

  private async drive(ctx: ExecutionContext, resumed: boolean, options: ResumeOptions): Promise<RunResult> {
    const { workflow } = ctx;
    const renderer = new PromptRenderer({
      collaborationGuide: options.collaborationGuide ?? this.collaborationGuide,
    });
    const startedAt = Date.now();

    ctx.start();
    this.checkpoint(ctx);
    this.logger.info(`${resumed ? 'Resuming' : 'Starting'} session ${ctx.sessionId} (${workflow.name}) at "${ctx.currentState}"`);
    this.eventBus.emitEvent({
      type: 'session.started',
      sessionId: ctx.sessionId,
      workflow: workflow.name,
      startState: ctx.currentState,
      resumed,
      timestamp: now(),
    });

    const complete = (outcome: Exclude<RunOutcome, 'aborted'>, reason: string): RunResult => {
      this.save(ctx);
      this.logger.info(`Session ${ctx.sessionId} ${outcome} after ${ctx.turnCount} turn(s): ${reason}`);
      this.eventBus.emitEvent({
        type: 'session.completed',
        sessionId: ctx.sessionId,
        outcome,
        reason,
        turnCount: ctx.turnCount,
        durationMs: Date.now() - startedAt,
        timestamp: now(),
      });
      return buildResult(ctx, outcome, reason);
    };

    for (;;) {
      if (options.cancellation?.isCancelled) {
        ctx.finish('paused');
        return complete('cancelled', options.cancellation.reason ?? `Cancelled before turn ${ctx.turnCount + 1}`);
      }

      const scope = ctx.conditionScope();
      const exit = workflow.exitConditions.find((e) => evaluateCondition(e.condition, scope, this.evaluateOptions));
      if (exit !== undefined) {
        this.logger.info(`Exit condition "${exit.condition.source}" matched (${exit.action})`);
        this.eventBus.emitEvent({
          type: 'exit.triggered',
          sessionId: ctx.sessionId,
          condition: exit.condition.source,
          action: exit.action,
          timestamp: now(),
        });
        if (exit.action === 'save_and_end') {
          ctx.finish('terminated', `Exit condition "${exit.condition.source}" triggered save_and_end`);
          return complete('terminated', `Saved and ended by exit condition "${exit.condition.source}"`);
        }
        ctx.finish('terminated');
        return complete('terminated', `Ended by exit condition "${exit.condition.source}"`);
      }

      if (ctx.turnCount >= workflow.maxTurns) {
        ctx.finish('halted');
        return complete('halted', `Reached max_turns (${workflow.maxTurns}) without ending`);
      }

      const state = ctx.currentStateSpec;
      const agent = workflow.agentIndex.get(state.agent);
      if (agent === undefined) throw new WorkflowError(`Unknown agent "${state.agent}"`, state.name);
      const turn = ctx.turnCount + 1;
      const turnStartedAt = Date.now();

      this.logger.debug(`Turn ${turn}: state "${state.name}", agent "${agent.name}"`);
      this.eventBus.emitEvent({
        type: 'turn.started',
        sessionId: ctx.sessionId,
        turn,
        state: state.name,
        agent: agent.name,
        timestamp: now(),
      });

      const rendered = renderer.render(state.prompt, ctx.templateVariables(renderer.collaborationGuide));
      for (const note of rendered.notes) {
        this.logger.warn(`State "${state.name}": ${note}`);
        this.eventBus.emitEvent({
          type: 'template.note',
          sessionId: ctx.sessionId,
          state: state.name,
          note,
          timestamp: now(),
        });
      }

      let reply: AgentReply;
      try {
        reply = await this.invokeAgent(
          { agentName: agent.name, agentType: agent.type, workspace: ctx.workspace, prompt: rendered.text },
          options.cancellation,
        );
      } catch (err) {
        if (options.cancellation?.isCancelled) {
          ctx.finish('paused');
          return complete('cancelled', options.cancellation.reason ?? `Cancelled during turn ${turn}`);
        }
        return this.abort(ctx, turn, errorMessage(err), '');
      }

      let block: ControlBlock;
      try {
        block = extractControlBlock(reply.text);
      } catch (err) {
        if (!(err instanceof ResponseFormatError)) throw err;
        return this.abort(ctx, turn, err.message, err.rawResponse);
      }

      ctx.mergeDecisions(block.decisions);
      ctx.recordTurn({
        state: state.name,
        agent: agent.name,
        prompt: rendered.text,
        rawResponse: reply.text,
        content: block.content,
        decisions: block.decisions,
      });
      this.eventBus.emitEvent({
        type: 'turn.completed',
        sessionId: ctx.sessionId,
        turn,
        state: state.name,
        agent: agent.name,
        content: block.content,
        decisions: block.decisions,
        durationMs: Date.now() - turnStartedAt,
        timestamp: now(),
      });

      // Derived keys seen by transitions already count the turn just recorded.
      const transitionScope = ctx.conditionScope();
      const taken = state.transitions.find((t) =>
        evaluateCondition(t.condition, transitionScope, this.evaluateOptions),
      );
      if (taken === undefined) {
        ctx.finish('terminated');
        return complete('terminated', `No transition matched in state "${state.name}"`);
      }

      const condition = taken.condition.source === '' ? null : taken.condition.source;
      this.logger.debug(`Transition "${state.name}" -> "${taken.to}"${condition ? ` on "${condition}"` : ''}`);
      this.eventBus.emitEvent({
        type: 'transition.taken',
        sessionId: ctx.sessionId,
        from: state.name,
        to: taken.to,
        condition,
        timestamp: now(),
      });

      if (taken.to === END_STATE) {
        ctx.finish('terminated');
        return complete('terminated', `Reached ${END_STATE} from state "${state.name}"`);
      }

      ctx.moveTo(taken.to);
      this.checkpoint(ctx);
    }
  }

  /** Call the proxy under the per-turn timeout; the signal fires on timeout or cancellation. */
  private async invokeAgent(request: AgentRequest, cancellation?: CancellationToken): Promise<AgentReply> {
    const controller = new AbortController();
    const unlink = cancellation?.link(controller);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const err = new AgentError(
          `Agent "${request.agentName}" timed out after ${this.agentTimeoutMs}ms`,
          request.agentName,
          undefined,
          true,
        );
        reject(err);
        controller.abort(err);
      }, this.agentTimeoutMs);
    });

    try {
      return await Promise.race([this.proxy.invoke(request, controller.signal), timeout]);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      unlink?.();
    }
  }

  private abort(
    ctx: ExecutionContext,
    turn: number,
    message: string,
    rawResponse: string,
  ): RunResult {
    const state = ctx.currentState;
    ctx.finish('aborted', `Turn ${turn}: ${message}`);
    this.save(ctx);
    this.logger.error(`Session ${ctx.sessionId} aborted at turn ${turn} in state "${state}": ${message}`);
    this.eventBus.emitEvent({
      type: 'session.failed',
      sessionId: ctx.sessionId,
      error: message,
      turn,
      state,
      timestamp: now(),
    });
    return {
      ...buildResult(ctx, 'aborted', message),
      error: { turn, message, rawResponse },
    };
  }

  private checkpoint(ctx: ExecutionContext): void {
    if (this.persistCheckpoints) this.save(ctx);
  }

  private save(ctx: ExecutionContext): void {
    this.store?.save(ctx.toPersisted());
  }
}

function buildResult(ctx: ExecutionContext, outcome: RunOutcome, reason: string): RunResult {
  return {
    sessionId: ctx.sessionId,
    outcome,
    reason,
    turnCount: ctx.turnCount,
    finalState: ctx.currentState,
    decisions: structuredClone(ctx.accumulatedDecisions),
    history: structuredClone([...ctx.turnHistory]),
    sessionError: ctx.error,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function now(): string {
  return new Date().toISOString();
}
