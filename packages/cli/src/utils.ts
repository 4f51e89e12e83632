// packages/cli/src/utils.ts

import { mkdirSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { AgentProxy, Logger, ProjectConfig, RunOutcome, WorkflowDefinition } from '@baton/core';
import { CliAgentProxy, STATE_DIRNAME, ScriptedAgentProxy, WorkflowLoader, openDatabase } from '@baton/core';
import { InvalidArgumentError } from 'commander';
import { z } from 'zod';

export function getDbPath(projectDir?: string): string {
  const base = projectDir ?? process.cwd();
  const dbDir = join(base, STATE_DIRNAME, 'db');
  mkdirSync(dbDir, { recursive: true });
  return join(dbDir, 'baton.db');
}

/** Run `fn` with a database connection that is closed afterwards. */
export async function withDatabase<T>(fn: (db: ReturnType<typeof openDatabase>) => Promise<T>): Promise<T> {
  const db = openDatabase(getDbPath());
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

const OUTCOME_EXIT_CODES: Record<RunOutcome, number> = {
  terminated: 0,
  aborted: 2,
  halted: 3,
  cancelled: 4,
};

export function exitCodeForOutcome(outcome: RunOutcome): number {
  return OUTCOME_EXIT_CODES[outcome];
}

export function createWorkflowLoader(config: ProjectConfig): WorkflowLoader {
  return new WorkflowLoader({ workflowDir: resolve(config.workflowDir) });
}

/** A `.yml`/`.yaml` argument is a file path; anything else is a name in workflowDir. */
export function resolveWorkflow(ref: string, config: ProjectConfig): WorkflowDefinition {
  const loader = createWorkflowLoader(config);
  return /\.ya?ml$/i.test(ref) ? loader.loadFile(resolve(ref)) : loader.loadByName(ref);
}

const scriptSchema = z.record(z.string(), z.array(z.string()));

/** Read a `{ "<agent>": ["reply", ...] }` file for ScriptedAgentProxy. */
export function loadScript(path: string): Record<string, string[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(`Cannot read script file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = scriptSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid script file ${path}: ${issues}`);
  }
  return result.data;
}

export function createProxy(config: ProjectConfig, logger: Logger, scriptPath?: string): AgentProxy {
  if (scriptPath !== undefined) return new ScriptedAgentProxy(loadScript(scriptPath));
  return new CliAgentProxy({
    agents: config.agents,
    defaultTimeoutSec: config.engine.agentTimeoutSec,
    logger,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
