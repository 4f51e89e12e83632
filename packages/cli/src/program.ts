// packages/cli/src/program.ts

import { Command } from 'commander';

import { VERSION } from '@baton/core';

import { initCommand } from './commands/init.js';
import { resumeCommand } from './commands/resume.js';
import { runCommand } from './commands/run.js';
import { sessionsListCommand, sessionsShowCommand } from './commands/sessions.js';
import { validateCommand } from './commands/validate.js';
import { workflowsCommand } from './commands/workflows.js';
import { parsePositiveInt } from './utils.js';

function setExitCode(code: number): void {
  process.exitCode = code;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('baton')
    .description('Turn-based multi-agent workflow runner')
    .version(VERSION);

  program
    .command('init')
    .description('Create .baton.yml and the .baton/ state directory')
    .option('--force', 'Overwrite an existing .baton.yml')
    .action(async (options: { force?: boolean }) => setExitCode(await initCommand(options)));

  program
    .command('validate')
    .description('Check a workflow definition and list every violation')
    .argument('<workflow>', 'Workflow file (.yml/.yaml) or name in workflowDir')
    .action(async (workflow: string) => setExitCode(await validateCommand(workflow)));

  program
    .command('run')
    .description('Run a workflow as a new session')
    .argument('<workflow>', 'Workflow file (.yml/.yaml) or name in workflowDir')
    .option('--message <text>', 'Initial message (overrides the workflow default)')
    .option('--workspace <dir>', 'Shared workspace directory (default: <workspaceDir>/<session-id>)')
    .option('--timeout <seconds>', 'Per-turn agent timeout', parsePositiveInt)
    .option('--script <file>', 'Replay agent replies from a JSON file instead of running agent commands')
    .option('--verbose', 'Enable debug logging')
    .action(async (workflow: string, options: Parameters<typeof runCommand>[1]) =>
      setExitCode(await runCommand(workflow, options)),
    );

  program
    .command('resume')
    .description('Continue a paused or interrupted session')
    .argument('<session-id>', 'Session ID')
    .option('--timeout <seconds>', 'Per-turn agent timeout', parsePositiveInt)
    .option('--script <file>', 'Replay agent replies from a JSON file instead of running agent commands')
    .option('--verbose', 'Enable debug logging')
    .action(async (sessionId: string, options: Parameters<typeof resumeCommand>[1]) =>
      setExitCode(await resumeCommand(sessionId, options)),
    );

  const sessions = program.command('sessions').description('Inspect stored sessions');

  sessions
    .command('list')
    .description('List sessions, most recently updated first')
    .option('--status <status>', 'Filter by status (idle|running|paused|terminated|aborted|halted)')
    .option('--limit <n>', 'Max results', parsePositiveInt, 20)
    .action(async (options: Parameters<typeof sessionsListCommand>[0]) =>
      setExitCode(await sessionsListCommand(options)),
    );

  sessions
    .command('show')
    .description('Show a session with its turn history')
    .argument('<session-id>', 'Session ID')
    .option('--json', 'Print the persisted session JSON')
    .action(async (sessionId: string, options: Parameters<typeof sessionsShowCommand>[1]) =>
      setExitCode(await sessionsShowCommand(sessionId, options)),
    );

  program
    .command('workflows')
    .description('List workflows in workflowDir')
    .action(async () => setExitCode(await workflowsCommand()));

  return program;
}
