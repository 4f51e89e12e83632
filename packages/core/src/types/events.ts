// packages/core/src/types/events.ts

/**
 * Engine events, emitted by the workflow runner and consumed by the CLI.
 * Type names are dot-separated.
 */

import type { RunOutcome } from './session.js';
import type { Decisions } from './values.js';
import type { ExitAction } from './workflow.js';

// -- Lifecycle events --
export interface SessionStartedEvent {
  type: 'session.started';
  sessionId: string;
  workflow: string;
  startState: string;
  resumed: boolean;
  timestamp: string;
}

export interface SessionCompletedEvent {
  type: 'session.completed';
  sessionId: string;
  outcome: Exclude<RunOutcome, 'aborted'>;
  reason: string;
  turnCount: number;
  durationMs: number;
  timestamp: string;
}

export interface SessionFailedEvent {
  type: 'session.failed';
  sessionId: string;
  error: string;
  turn: number;
  state: string;
  timestamp: string;
}

// -- Turn events --
export interface TurnStartedEvent {
  type: 'turn.started';
  sessionId: string;
  turn: number;
  state: string;
  agent: string;
  timestamp: string;
}

export interface TurnCompletedEvent {
  type: 'turn.completed';
  sessionId: string;
  turn: number;
  state: string;
  agent: string;
  content: string;
  decisions: Decisions;
  durationMs: number;
  timestamp: string;
}

export interface TransitionTakenEvent {
  type: 'transition.taken';
  sessionId: string;
  from: string;
  to: string;
  condition: string | null;
  timestamp: string;
}

export interface ExitTriggeredEvent {
  type: 'exit.triggered';
  sessionId: string;
  condition: string;
  action: ExitAction;
  timestamp: string;
}

export interface TemplateNoteEvent {
  type: 'template.note';
  sessionId: string;
  state: string;
  note: string;
  timestamp: string;
}

export type EngineEvent =
  | SessionStartedEvent
  | SessionCompletedEvent
  | SessionFailedEvent
  | TurnStartedEvent
  | TurnCompletedEvent
  | TransitionTakenEvent
  | ExitTriggeredEvent
  | TemplateNoteEvent;
