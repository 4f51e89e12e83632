// packages/cli/src/commands/run.ts

import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { ProjectConfig, RunResult } from '@baton/core';
import {
  CancellationToken,
  EventBus,
  SessionStore,
  WorkflowRunner,
  createLogger,
  generateSessionId,
  loadConfig,
} from '@baton/core';

import { RunRenderer, printError, printRunResult } from '../render.js';
import { createProxy, errorMessage, exitCodeForOutcome, resolveWorkflow, withDatabase } from '../utils.js';

export interface SessionRunOptions {
  timeout?: number;
  script?: string;
  verbose?: boolean;
}

interface RunOptions extends SessionRunOptions {
  message?: string;
  workspace?: string;
}

export function loadRunConfig(options: SessionRunOptions): ProjectConfig {
  return loadConfig({
    overrides: options.timeout !== undefined ? { engine: { agentTimeoutSec: options.timeout } } : undefined,
  });
}

/**
 * Wire a WorkflowRunner to the CLI (proxy, SQLite store, renderer, SIGINT)
 * and hand it to `start`.
 */
export async function driveSession(
  config: ProjectConfig,
  options: SessionRunOptions,
  db: ConstructorParameters<typeof SessionStore>[0],
  start: (runner: WorkflowRunner, cancellation: CancellationToken) => Promise<RunResult>,
): Promise<RunResult> {
  const logger = createLogger(options.verbose ? 'debug' : config.advanced.logLevel);
  const eventBus = new EventBus();
  const renderer = new RunRenderer();
  eventBus.on('event', (event) => renderer.handle(event));

  const runner = new WorkflowRunner({
    proxy: createProxy(config, logger, options.script),
    eventBus,
    store: new SessionStore(db),
    logger,
    collaborationGuide: config.collaborationGuide,
    agentTimeoutMs: config.engine.agentTimeoutSec * 1000,
    persistCheckpoints: config.engine.persistCheckpoints,
  });

  const cancellation = new CancellationToken();
  const onSigint = (): void => {
    console.error('\nInterrupt received: finishing the current turn, then pausing...');
    try {
      cancellation.cancel('Interrupted by user');
    } catch (err) {
      logger.error(`Cancellation callback failed: ${errorMessage(err)}`);
    }
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await start(runner, cancellation);
    printRunResult(result);
    return result;
  } finally {
    renderer.stop();
    process.off('SIGINT', onSigint);
  }
}

export async function runCommand(workflowRef: string, options: RunOptions): Promise<number> {
  try {
    const config = loadRunConfig(options);
    const workflow = resolveWorkflow(workflowRef, config);
    const sessionId = generateSessionId();
    const workspace = resolve(options.workspace ?? join(config.workspaceDir, sessionId));
    mkdirSync(workspace, { recursive: true });

    return await withDatabase(async (db) => {
      const result = await driveSession(config, options, db, (runner, cancellation) =>
        runner.run(workflow, { workspace, sessionId, initialMessage: options.message, cancellation }),
      );
      return exitCodeForOutcome(result.outcome);
    });
  } catch (error) {
    printError(error);
    return 1;
  }
}
