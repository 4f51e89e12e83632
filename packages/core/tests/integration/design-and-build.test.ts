// packages/core/tests/integration/design-and-build.test.ts
// Bundled workflow driven end to end with scripted agents and an in-memory database

import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ScriptedAgentProxy } from '../../src/agents/scripted-agent.js';
import { EventBus } from '../../src/engine/event-bus.js';
import { WorkflowLoader } from '../../src/engine/workflow-loader.js';
import { WorkflowRunner } from '../../src/engine/workflow-runner.js';
import { openDatabase } from '../../src/memory/database.js';
import { SessionStore } from '../../src/memory/session-store.js';
import { DEFAULT_COLLABORATION_GUIDE } from '../../src/templates/guide.js';
import type { Decisions } from '../../src/types/values.js';

const workflowDir = fileURLToPath(new URL('../../../../workflows/', import.meta.url));
const workflow = new WorkflowLoader({ workflowDir }).loadByName('design-and-build');

function reply(content: string, decisions: Decisions): string {
  return `I updated the files in collab/.\n\n${JSON.stringify({ content, decisions })}`;
}

let db: Database.Database;
let store: SessionStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new SessionStore(db);
});

afterEach(() => {
  db.close();
});

describe('design-and-build workflow', () => {
  it('loops build and review until the reviewer approves', async () => {
    const proxy = new ScriptedAgentProxy({
      architect: [
        reply('Design written', { design_ready: true }),
        reply('Add input validation', { review_status: 'changes_requested', score: 5 }),
        reply('Looks good', { review_status: 'approved', score: 9 }),
      ],
      coder: [reply('First build', { build_done: true }), reply('Validation added', { build_done: true })],
    });
    const transitions: string[] = [];
    const eventBus = new EventBus();
    eventBus.onEvent('transition.taken', (e) => transitions.push(`${e.from}->${e.to}`));

    const result = await new WorkflowRunner({ proxy, store, eventBus }).run(workflow, { workspace: '/tmp/ws' });

    expect(result.outcome).toBe('terminated');
    expect(result.reason).toBe('Reached END from state "review"');
    expect(result.turnCount).toBe(5);
    expect(transitions).toEqual(['design->build', 'build->review', 'review->build', 'build->review', 'review->END']);
    expect(result.decisions).toEqual({
      design_ready: true,
      build_done: true,
      review_status: 'approved',
      score: 9,
    });

    const prompts = proxy.requests.map((r) => r.prompt);
    expect(prompts[0].startsWith(DEFAULT_COLLABORATION_GUIDE)).toBe(true);
    expect(prompts[0]).toContain('## Task\nBuild a small command-line todo application with tests\n');
    expect(prompts[1]).toContain('Start from the design the architect wrote.');
    expect(prompts[1]).not.toContain('The reviewer asked for changes');
    expect(prompts[2]).toContain('## Review (turn 2 of 12)');
    expect(prompts[2]).toContain('The coder reported: First build');
    expect(prompts[2]).toContain('{\n  "build_done": true\n}');
    expect(prompts[3]).toContain('The reviewer asked for changes:\nAdd input validation');
    expect(prompts[3]).not.toContain('Start from the design');

    const stored = store.get(result.sessionId);
    expect(stored?.status).toBe('terminated');
    expect(stored?.turnHistory.map((t) => `${t.turn}:${t.state}:${t.agent}`)).toEqual([
      '1:design:architect',
      '2:build:coder',
      '3:review:architect',
      '4:build:coder',
      '5:review:architect',
    ]);
  });

  it('saves and ends when the review loop runs out of turns', async () => {
    const proxy = new ScriptedAgentProxy({
      architect: [
        reply('Design written', { design_ready: true }),
        ...Array.from({ length: 5 }, (_, i) =>
          reply(`Still missing tests (${i + 1})`, { review_status: 'changes_requested', score: 4 }),
        ),
      ],
      coder: Array.from({ length: 6 }, (_, i) => reply(`Build ${i + 1}`, { build_done: true })),
    });

    const result = await new WorkflowRunner({ proxy, store }).run(workflow, { workspace: '/tmp/ws' });

    expect(result.outcome).toBe('terminated');
    expect(result.turnCount).toBe(12);
    expect(result.finalState).toBe('review');
    expect(result.reason).toBe('Saved and ended by exit condition "max_turns_exceeded"');
    expect(proxy.remaining('architect')).toBe(0);
    expect(proxy.remaining('coder')).toBe(0);
    expect(store.get(result.sessionId)?.error).toBe(
      'Exit condition "max_turns_exceeded" triggered save_and_end',
    );
  });
});
