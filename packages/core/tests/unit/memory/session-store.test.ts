import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ScriptedAgentProxy } from '../../../src/agents/scripted-agent.js';
import { CancellationToken } from '../../../src/engine/cancellation.js';
import { WorkflowLoader } from '../../../src/engine/workflow-loader.js';
import { WorkflowRunner } from '../../../src/engine/workflow-runner.js';
import { openDatabase } from '../../../src/memory/database.js';
import { SessionStore } from '../../../src/memory/session-store.js';
import type { PersistedSession, TurnRecord } from '../../../src/types/session.js';
import { DatabaseError } from '../../../src/utils/errors.js';

let db: Database.Database;
let store: SessionStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new SessionStore(db);
});

afterEach(() => {
  db.close();
});

function turn(n: number, content: string): TurnRecord {
  return {
    turn: n,
    state: 'A',
    agent: 'arch',
    prompt: `prompt ${n}`,
    rawResponse: `raw ${n}`,
    content,
    decisions: { n },
    recordedAt: `2026-01-01T00:00:0${n}.000Z`,
  };
}

function makeSession(overrides: Partial<PersistedSession> = {}): PersistedSession {
  return {
    sessionId: 'ses_1',
    workflowName: 'flow',
    initialMessage: 'Start here',
    currentState: 'A',
    turnCount: 0,
    accumulatedDecisions: {},
    turnHistory: [],
    status: 'running',
    workspace: '/tmp/ws',
    error: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('SessionStore', () => {
  it('saves and restores a session with its turns', () => {
    const session = makeSession({
      turnCount: 2,
      accumulatedDecisions: { n: 2, nested: { ok: true } },
      turnHistory: [turn(1, 'one'), turn(2, 'two')],
    });
    store.save(session);

    expect(store.get('ses_1')).toEqual(session);
  });

  it('returns null for a non-existent session', () => {
    expect(store.get('nonexistent')).toBeNull();
  });

  it('upserts the session row and appends only new turns', () => {
    store.save(makeSession({ turnCount: 1, turnHistory: [turn(1, 'one')] }));
    store.save(
      makeSession({
        turnCount: 2,
        currentState: 'B',
        status: 'halted',
        turnHistory: [turn(1, 'changed'), turn(2, 'two')],
        updatedAt: '2026-01-01T00:00:09.000Z',
      }),
    );

    const restored = store.get('ses_1');
    expect(restored?.currentState).toBe('B');
    expect(restored?.status).toBe('halted');
    expect(restored?.turnHistory.map((t) => t.content)).toEqual(['one', 'two']);
    expect(store.list()).toHaveLength(1);
  });

  it('keeps the error text', () => {
    store.save(makeSession({ status: 'aborted', error: 'Turn 1: bad reply' }));
    expect(store.get('ses_1')?.error).toBe('Turn 1: bad reply');
  });

  it('lists sessions newest first with filters', () => {
    store.save(makeSession({ sessionId: 'ses_a', updatedAt: '2026-01-01T00:00:01.000Z' }));
    store.save(
      makeSession({ sessionId: 'ses_b', status: 'terminated', updatedAt: '2026-01-01T00:00:03.000Z' }),
    );
    store.save(
      makeSession({ sessionId: 'ses_c', workflowName: 'other', updatedAt: '2026-01-01T00:00:02.000Z' }),
    );

    expect(store.list().map((s) => s.sessionId)).toEqual(['ses_b', 'ses_c', 'ses_a']);
    expect(store.list({ status: 'running' }).map((s) => s.sessionId)).toEqual(['ses_c', 'ses_a']);
    expect(store.list({ workflowName: 'other' }).map((s) => s.sessionId)).toEqual(['ses_c']);
    expect(store.list({ limit: 1 }).map((s) => s.sessionId)).toEqual(['ses_b']);
  });

  it('updates status', () => {
    store.save(makeSession());
    expect(store.updateStatus('ses_1', 'paused')).toBe(true);
    expect(store.get('ses_1')?.status).toBe('paused');
    expect(store.updateStatus('missing', 'paused')).toBe(false);
  });

  it('deletes a session together with its turns', () => {
    store.save(makeSession({ turnCount: 1, turnHistory: [turn(1, 'one')] }));
    expect(store.delete('ses_1')).toBe(true);
    expect(store.get('ses_1')).toBeNull();
    expect(store.getTurns('ses_1')).toEqual([]);
    expect(store.delete('ses_1')).toBe(false);
  });

  it('wraps constraint failures in DatabaseError', () => {
    const broken = makeSession({ turnHistory: [{ ...turn(1, 'one'), turn: 0 }] });
    expect(() => store.save(broken)).toThrow(DatabaseError);
    expect(store.get('ses_1')).toBeNull();
  });
});

describe('SessionStore with WorkflowRunner', () => {
  const workflow = new WorkflowLoader().load({
    name: 'flow',
    initial_message: 'Start here',
    max_turns: 5,
    agents: [{ name: 'arch', type: 'architect' }],
    states: [
      { name: 'A', agent: 'arch', start: true, prompt: 'go', transitions: [{ to: 'B' }] },
      { name: 'B', agent: 'arch', prompt: 'again', transitions: [{ to: 'END' }] },
    ],
  });
  const reply = (content: string) => JSON.stringify({ content, decisions: { step: content } });

  it('resumes a paused run from the stored checkpoint', async () => {
    const token = new CancellationToken();
    const first = new ScriptedAgentProxy({
      arch: [
        () => {
          token.cancel();
          return reply('one');
        },
      ],
    });
    const paused = await new WorkflowRunner({ proxy: first, store }).run(workflow, {
      workspace: '/tmp/ws',
      cancellation: token,
    });

    const stored = store.get(paused.sessionId);
    expect(stored?.status).toBe('paused');
    expect(stored?.currentState).toBe('B');
    if (stored === null) throw new Error('session missing');

    const second = new ScriptedAgentProxy({ arch: [reply('two')] });
    const result = await new WorkflowRunner({ proxy: second, store }).resume(workflow, stored);

    expect(result.outcome).toBe('terminated');
    expect(store.get(paused.sessionId)?.turnHistory.map((t) => t.content)).toEqual(['one', 'two']);
    expect(store.get(paused.sessionId)?.accumulatedDecisions).toEqual({ step: 'two' });
  });
});
