// packages/core/src/memory/session-codec.ts

import { z } from 'zod';
import { decisionsSchema } from '../engine/response-parser.js';
import type { PersistedSession, TurnRecord } from '../types/session.js';
import { WorkflowError } from '../utils/errors.js';

export const sessionStatusSchema = z.enum(['idle', 'running', 'paused', 'terminated', 'aborted', 'halted']);

const turnJsonSchema = z.object({
  turn: z.number().int().positive(),
  state: z.string(),
  agent: z.string(),
  prompt: z.string(),
  raw_response: z.string(),
  content: z.string(),
  decisions: decisionsSchema,
  recorded_at: z.string(),
});

/** External (snake_case) layout of a persisted session. */
export const sessionJsonSchema = z.object({
  session_id: z.string().min(1),
  workflow_name: z.string().min(1),
  initial_message: z.string().default(''),
  current_state: z.string().min(1),
  turn_count: z.number().int().nonnegative(),
  accumulated_decisions: decisionsSchema,
  turn_history: z.array(turnJsonSchema),
  status: sessionStatusSchema,
  workspace: z.string(),
  error: z.string().nullable().default(null),
  created_at: z.string(),
  updated_at: z.string(),
});

export type SessionJson = z.output<typeof sessionJsonSchema>;

export function toSessionJson(session: PersistedSession): SessionJson {
  return {
    session_id: session.sessionId,
    workflow_name: session.workflowName,
    initial_message: session.initialMessage,
    current_state: session.currentState,
    turn_count: session.turnCount,
    accumulated_decisions: session.accumulatedDecisions,
    turn_history: session.turnHistory.map((t) => ({
      turn: t.turn,
      state: t.state,
      agent: t.agent,
      prompt: t.prompt,
      raw_response: t.rawResponse,
      content: t.content,
      decisions: t.decisions,
      recorded_at: t.recordedAt,
    })),
    status: session.status,
    workspace: session.workspace,
    error: session.error,
    created_at: session.createdAt,
    updated_at: session.updatedAt,
  };
}

/** Validate an external session object. Throws WorkflowError listing the problems. */
export function fromSessionJson(value: unknown): PersistedSession {
  const result = sessionJsonSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new WorkflowError(`Invalid session data: ${issues}`);
  }
  const data = result.data;
  const turnHistory: TurnRecord[] = data.turn_history.map((t) => ({
    turn: t.turn,
    state: t.state,
    agent: t.agent,
    prompt: t.prompt,
    rawResponse: t.raw_response,
    content: t.content,
    decisions: t.decisions,
    recordedAt: t.recorded_at,
  }));
  return {
    sessionId: data.session_id,
    workflowName: data.workflow_name,
    initialMessage: data.initial_message,
    currentState: data.current_state,
    turnCount: data.turn_count,
    accumulatedDecisions: data.accumulated_decisions,
    turnHistory,
    status: data.status,
    workspace: data.workspace,
    error: data.error,
    createdAt: data.created_at,
    updatedAt: data.updated_at,
  };
}

export function parseSessionJson(text: string): PersistedSession {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new WorkflowError(`Invalid session JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return fromSessionJson(parsed);
}
