import { describe, expect, it } from 'vitest';
import { fromSessionJson, parseSessionJson, toSessionJson } from '../../../src/memory/session-codec.js';
import type { PersistedSession } from '../../../src/types/session.js';
import { WorkflowError } from '../../../src/utils/errors.js';

const session: PersistedSession = {
  sessionId: 'ses_abc',
  workflowName: 'design-and-build',
  initialMessage: 'Build a parser',
  currentState: 'review',
  turnCount: 1,
  accumulatedDecisions: { score: 7, tags: ['a'] },
  turnHistory: [
    {
      turn: 1,
      state: 'design',
      agent: 'planner',
      prompt: 'Design it',
      rawResponse: 'done {"content":"ok","decisions":{"score":7}}',
      content: 'ok',
      decisions: { score: 7 },
      recordedAt: '2026-01-01T00:00:01.000Z',
    },
  ],
  status: 'paused',
  workspace: '/tmp/ws',
  error: null,
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:01.000Z',
};

describe('session JSON codec', () => {
  it('writes snake_case keys', () => {
    const json = toSessionJson(session);
    expect(json.session_id).toBe('ses_abc');
    expect(json.accumulated_decisions).toEqual({ score: 7, tags: ['a'] });
    expect(json.turn_history[0]).toEqual({
      turn: 1,
      state: 'design',
      agent: 'planner',
      prompt: 'Design it',
      raw_response: 'done {"content":"ok","decisions":{"score":7}}',
      content: 'ok',
      decisions: { score: 7 },
      recorded_at: '2026-01-01T00:00:01.000Z',
    });
  });

  it('reads back what it writes', () => {
    expect(parseSessionJson(JSON.stringify(toSessionJson(session)))).toEqual(session);
  });

  it('defaults missing initial_message and error', () => {
    const { initial_message: _message, error: _error, ...rest } = toSessionJson(session);
    const restored = fromSessionJson(rest);
    expect(restored.initialMessage).toBe('');
    expect(restored.error).toBeNull();
  });

  it('lists every invalid field', () => {
    const bad = { ...toSessionJson(session), status: 'exploded', turn_count: -1 };
    expect(() => fromSessionJson(bad)).toThrow(WorkflowError);
    expect(() => fromSessionJson(bad)).toThrow(/^Invalid session data: turn_count: .*; status: /);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseSessionJson('{nope')).toThrow(/^Invalid session JSON: /);
  });
});
