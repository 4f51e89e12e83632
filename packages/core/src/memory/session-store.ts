// packages/core/src/memory/session-store.ts

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { decisionsSchema } from '../engine/response-parser.js';
import type { SessionPersistence } from '../engine/workflow-runner.js';
import type { PersistedSession, SessionStatus, SessionSummary, TurnRecord } from '../types/session.js';
import type { Decisions } from '../types/values.js';
import { DatabaseError } from '../utils/errors.js';
import { sessionStatusSchema } from './session-codec.js';

const sessionRowSchema = z.object({
  id: z.string(),
  workflow_name: z.string(),
  initial_message: z.string(),
  current_state: z.string(),
  turn_count: z.number(),
  decisions_json: z.string(),
  status: sessionStatusSchema,
  workspace: z.string(),
  error: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const turnRowSchema = z.object({
  turn: z.number(),
  state: z.string(),
  agent: z.string(),
  prompt: z.string(),
  raw_response: z.string(),
  content: z.string(),
  decisions_json: z.string(),
  recorded_at: z.string(),
});

type SessionRow = z.output<typeof sessionRowSchema>;

export interface SessionListFilter {
  status?: SessionStatus;
  workflowName?: string;
  limit?: number;
}

/** SQLite-backed session checkpoints. Turns are append-only. */
export class SessionStore implements SessionPersistence {
  constructor(private db: Database.Database) {}

  /** Upsert the session row and insert turns not stored yet, in one transaction. */
  save(session: PersistedSession): void {
    const upsert = this.db.prepare(
      `INSERT INTO sessions (id, workflow_name, initial_message, current_state, turn_count, decisions_json, status, workspace, error, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         current_state = excluded.current_state,
         turn_count = excluded.turn_count,
         decisions_json = excluded.decisions_json,
         status = excluded.status,
         error = excluded.error,
         updated_at = excluded.updated_at`,
    );
    const insertTurn = this.db.prepare(
      `INSERT OR IGNORE INTO turns (session_id, turn, state, agent, prompt, raw_response, content, decisions_json, recorded_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    try {
      this.db.transaction(() => {
        upsert.run(
          session.sessionId,
          session.workflowName,
          session.initialMessage,
          session.currentState,
          session.turnCount,
          JSON.stringify(session.accumulatedDecisions),
          session.status,
          session.workspace,
          session.error,
          session.createdAt,
          session.updatedAt,
        );
        for (const t of session.turnHistory) {
          insertTurn.run(
            session.sessionId,
            t.turn,
            t.state,
            t.agent,
            t.prompt,
            t.rawResponse,
            t.content,
            JSON.stringify(t.decisions),
            t.recordedAt,
          );
        }
      })();
    } catch (err) {
      throw new DatabaseError(
        `Failed to save session ${session.sessionId}: ${err instanceof Error ? err.message : String(err)}`,
        'save',
      );
    }
  }

  get(sessionId: string): PersistedSession | null {
    const row: unknown = this.db.prepare('SELECT * FROM sessions WHERE id = ?').get(sessionId);
    if (row === undefined) return null;
    const session = parseRow(sessionRowSchema, row, 'get');
    return {
      sessionId: session.id,
      workflowName: session.workflow_name,
      initialMessage: session.initial_message,
      currentState: session.current_state,
      turnCount: session.turn_count,
      accumulatedDecisions: parseDecisions(session.decisions_json),
      turnHistory: this.getTurns(sessionId),
      status: session.status,
      workspace: session.workspace,
      error: session.error,
      createdAt: session.created_at,
      updatedAt: session.updated_at,
    };
  }

  list(filter?: SessionListFilter): SessionSummary[] {
    let sql = 'SELECT * FROM sessions WHERE 1=1';
    const params: (string | number)[] = [];

    if (filter?.status) {
      sql += ' AND status = ?';
      params.push(filter.status);
    }
    if (filter?.workflowName) {
      sql += ' AND workflow_name = ?';
      params.push(filter.workflowName);
    }
    sql += ' ORDER BY updated_at DESC, id ASC';
    if (filter?.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }

    const rows: unknown[] = this.db.prepare(sql).all(...params);
    return rows.map((r) => toSummary(parseRow(sessionRowSchema, r, 'list')));
  }

  getTurns(sessionId: string): TurnRecord[] {
    const rows: unknown[] = this.db
      .prepare('SELECT * FROM turns WHERE session_id = ? ORDER BY turn ASC')
      .all(sessionId);
    return rows.map((r) => {
      const row = parseRow(turnRowSchema, r, 'getTurns');
      return {
        turn: row.turn,
        state: row.state,
        agent: row.agent,
        prompt: row.prompt,
        rawResponse: row.raw_response,
        content: row.content,
        decisions: parseDecisions(row.decisions_json),
        recordedAt: row.recorded_at,
      };
    });
  }

  updateStatus(sessionId: string, status: SessionStatus): boolean {
    const result = this.db
      .prepare('UPDATE sessions SET status = ?, updated_at = ? WHERE id = ?')
      .run(status, new Date().toISOString(), sessionId);
    return result.changes > 0;
  }

  /** Delete a session and its turns. Returns false when it did not exist. */
  delete(sessionId: string): boolean {
    const result = this.db.prepare('DELETE FROM sessions WHERE id = ?').run(sessionId);
    return result.changes > 0;
  }
}

function toSummary(row: SessionRow): SessionSummary {
  return {
    sessionId: row.id,
    workflowName: row.workflow_name,
    currentState: row.current_state,
    turnCount: row.turn_count,
    status: row.status,
    error: row.error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, operation: string): T {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new DatabaseError(`Corrupt row: ${result.error.issues[0]?.message ?? 'unknown issue'}`, operation);
  }
  return result.data;
}

function parseDecisions(json: string): Decisions {
  const result = decisionsSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    throw new DatabaseError('Corrupt decisions column', 'parse');
  }
  return result.data;
}
