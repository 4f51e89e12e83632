// packages/core/src/engine/execution-context.ts

import type { PersistedSession, SessionStatus, TurnRecord, WorkspaceHandle } from '../types/session.js';
import type { Decisions } from '../types/values.js';
import type { StateSpec, WorkflowDefinition } from '../types/workflow.js';
import { WorkflowError } from '../utils/errors.js';
import { generateSessionId } from '../utils/id.js';

export interface ExecutionContextOptions {
  workspace: WorkspaceHandle;
  sessionId?: string;
  /** Overrides the workflow's initial_message for this run. */
  initialMessage?: string;
}

export type TurnInput = Omit<TurnRecord, 'turn' | 'recordedAt'>;

/**
 * Mutable state of one run. Decisions and the workspace handle live for the
 * whole run; nothing is reset between turns.
 */
export class ExecutionContext {
  private state: string;
  private turns: number;
  private decisions: Decisions;
  private history: TurnRecord[];
  private runStatus: SessionStatus;
  private errorMessage: string | null;
  private readonly createdAt: string;
  private updatedAt: string;

  private constructor(
    readonly workflow: WorkflowDefinition,
    readonly sessionId: string,
    readonly workspace: WorkspaceHandle,
    readonly initialMessage: string,
    snapshot?: PersistedSession,
  ) {
    const now = new Date().toISOString();
    this.state = snapshot?.currentState ?? workflow.startState;
    this.turns = snapshot?.turnCount ?? 0;
    this.decisions = snapshot ? structuredClone(snapshot.accumulatedDecisions) : {};
    this.history = snapshot ? structuredClone(snapshot.turnHistory) : [];
    this.runStatus = snapshot?.status ?? 'idle';
    this.errorMessage = snapshot?.error ?? null;
    this.createdAt = snapshot?.createdAt ?? now;
    this.updatedAt = snapshot?.updatedAt ?? now;
  }

  static create(workflow: WorkflowDefinition, options: ExecutionContextOptions): ExecutionContext {
    return new ExecutionContext(
      workflow,
      options.sessionId ?? generateSessionId(),
      options.workspace,
      options.initialMessage ?? workflow.initialMessage,
    );
  }

  static restore(workflow: WorkflowDefinition, persisted: PersistedSession): ExecutionContext {
    if (persisted.workflowName !== workflow.name) {
      throw new WorkflowError(
        `Session ${persisted.sessionId} belongs to workflow "${persisted.workflowName}", not "${workflow.name}"`,
      );
    }
    if (!workflow.stateIndex.has(persisted.currentState)) {
      throw new WorkflowError(
        `Session ${persisted.sessionId} is at unknown state "${persisted.currentState}"`,
        persisted.currentState,
      );
    }
    return new ExecutionContext(
      workflow,
      persisted.sessionId,
      persisted.workspace,
      persisted.initialMessage,
      persisted,
    );
  }

  get currentState(): string {
    return this.state;
  }

  get currentStateSpec(): StateSpec {
    const spec = this.workflow.stateIndex.get(this.state);
    if (spec === undefined) throw new WorkflowError(`Unknown state "${this.state}"`, this.state);
    return spec;
  }

  get turnCount(): number {
    return this.turns;
  }

  get status(): SessionStatus {
    return this.runStatus;
  }

  get error(): string | null {
    return this.errorMessage;
  }

  get accumulatedDecisions(): Readonly<Decisions> {
    return this.decisions;
  }

  get turnHistory(): readonly TurnRecord[] {
    return this.history;
  }

  get lastTurn(): TurnRecord | undefined {
    return this.history[this.history.length - 1];
  }

  /** Most recent value wins per key; other keys are kept. */
  mergeDecisions(decisions: Readonly<Decisions>): void {
    this.decisions = { ...this.decisions, ...structuredClone(decisions) };
    this.touch();
  }

  recordTurn(input: TurnInput): TurnRecord {
    this.turns += 1;
    const record: TurnRecord = { ...input, turn: this.turns, recordedAt: new Date().toISOString() };
    this.history.push(record);
    this.touch();
    return record;
  }

  moveTo(state: string): void {
    if (!this.workflow.stateIndex.has(state)) {
      throw new WorkflowError(`Cannot move to unknown state "${state}"`, state);
    }
    this.state = state;
    this.touch();
  }

  start(): void {
    this.runStatus = 'running';
    this.touch();
  }

  finish(status: SessionStatus, error?: string): void {
    this.runStatus = status;
    if (error !== undefined) this.errorMessage = error;
    this.touch();
  }

  /** Completed turns of `state`, optionally restricted to one agent. */
  visitCount(state: string, agent?: string): number {
    return this.history.filter((t) => t.state === state && (agent === undefined || t.agent === agent)).length;
  }

  /** Accumulated decisions overlaid with derived run keys. */
  conditionScope(): Decisions {
    const counters: Decisions = {};
    for (const record of this.history) {
      const key = `turn_count_${record.agent}_${record.state}`;
      const current = counters[key];
      counters[key] = typeof current === 'number' ? current + 1 : 1;
    }
    return {
      ...this.decisions,
      ...counters,
      turn_count: this.turns,
      max_turns: this.workflow.maxTurns,
      max_turns_exceeded: this.turns >= this.workflow.maxTurns,
      error_occurred: this.errorMessage !== null,
      current_state: this.state,
      last_agent_name: this.lastTurn?.agent ?? null,
    };
  }

  templateVariables(collaborationGuide: string): Decisions {
    const last = this.lastTurn;
    return {
      ...this.decisions,
      initial_message: this.initialMessage,
      workflow_name: this.workflow.name,
      current_state: this.state,
      last_agent_name: last?.agent ?? '',
      last_agent_content: last?.content ?? '',
      last_agent_decisions: JSON.stringify(last?.decisions ?? {}, null, 2),
      collaboration_guide: collaborationGuide,
      turn_count: this.turns,
      max_turns: this.workflow.maxTurns,
    };
  }

  toPersisted(): PersistedSession {
    return {
      sessionId: this.sessionId,
      workflowName: this.workflow.name,
      initialMessage: this.initialMessage,
      currentState: this.state,
      turnCount: this.turns,
      accumulatedDecisions: structuredClone(this.decisions),
      turnHistory: structuredClone(this.history),
      status: this.runStatus,
      workspace: this.workspace,
      error: this.errorMessage,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  private touch(): void {
    this.updatedAt = new Date().toISOString();
  }
}
