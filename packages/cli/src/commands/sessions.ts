// packages/cli/src/commands/sessions.ts

import { SessionStore, sessionStatusSchema, toSessionJson } from '@baton/core';
import chalk from 'chalk';

import { printError, printSessionDetail, printSessionList } from '../render.js';
import { withDatabase } from '../utils.js';

// ── baton sessions list ──

interface ListOptions {
  status?: string;
  limit?: number;
}

export async function sessionsListCommand(options: ListOptions): Promise<number> {
  const status = options.status === undefined ? undefined : sessionStatusSchema.safeParse(options.status);
  if (status && !status.success) {
    console.error(
      chalk.red(`Unknown status "${options.status}". Expected one of: ${sessionStatusSchema.options.join(', ')}`),
    );
    return 1;
  }

  try {
    return await withDatabase(async (db) => {
      const sessions = new SessionStore(db).list({ status: status?.data, limit: options.limit ?? 20 });
      printSessionList(sessions);
      return 0;
    });
  } catch (error) {
    printError(error);
    return 1;
  }
}

// ── baton sessions show ──

interface ShowOptions {
  json?: boolean;
}

export async function sessionsShowCommand(sessionId: string, options: ShowOptions): Promise<number> {
  try {
    return await withDatabase(async (db) => {
      const session = new SessionStore(db).get(sessionId);
      if (!session) {
        console.error(chalk.red(`No session found with ID: ${sessionId}`));
        return 1;
      }
      if (options.json) {
        console.log(JSON.stringify(toSessionJson(session), null, 2));
      } else {
        printSessionDetail(session);
      }
      return 0;
    });
  } catch (error) {
    printError(error);
    return 1;
  }
}
