// packages/core/src/types/session.ts

import type { Decisions } from './values.js';

export type SessionStatus = 'idle' | 'running' | 'paused' | 'terminated' | 'aborted' | 'halted';

export type RunOutcome = 'terminated' | 'aborted' | 'halted' | 'cancelled';

/**
 * Opaque reference to the shared working area of a run (usually a directory).
 * The engine passes it to the agent proxy untouched.
 */
export type WorkspaceHandle = string;

export interface TurnRecord {
  /** 1-based turn ordinal. */
  turn: number;
  state: string;
  agent: string;
  prompt: string;
  rawResponse: string;
  content: string;
  decisions: Decisions;
  recordedAt: string;
}

/** Everything needed to audit or resume a run. */
export interface PersistedSession {
  sessionId: string;
  workflowName: string;
  initialMessage: string;
  currentState: string;
  turnCount: number;
  accumulatedDecisions: Decisions;
  turnHistory: TurnRecord[];
  status: SessionStatus;
  workspace: WorkspaceHandle;
  error: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface SessionSummary {
  sessionId: string;
  workflowName: string;
  currentState: string;
  turnCount: number;
  status: SessionStatus;
  error: string | null;
  createdAt: string;
  updatedAt: string;
}
