// packages/cli/src/commands/resume.ts

import { SessionStore } from '@baton/core';
import chalk from 'chalk';

import { printError } from '../render.js';
import { createWorkflowLoader, exitCodeForOutcome, withDatabase } from '../utils.js';
import type { SessionRunOptions } from './run.js';
import { driveSession, loadRunConfig } from './run.js';

export async function resumeCommand(sessionId: string, options: SessionRunOptions): Promise<number> {
  try {
    const config = loadRunConfig(options);
    return await withDatabase(async (db) => {
      const persisted = new SessionStore(db).get(sessionId);
      if (!persisted) {
        console.error(chalk.red(`No session found with ID: ${sessionId}`));
        return 1;
      }
      const workflow = createWorkflowLoader(config).loadByName(persisted.workflowName);
      const result = await driveSession(config, options, db, (runner, cancellation) =>
        runner.resume(workflow, persisted, { cancellation }),
      );
      return exitCodeForOutcome(result.outcome);
    });
  } catch (error) {
    printError(error);
    return 1;
  }
}
