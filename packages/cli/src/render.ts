// packages/cli/src/render.ts -- Terminal rendering for engine events

import type { EngineEvent, PersistedSession, RunResult, SessionStatus, SessionSummary } from '@baton/core';
import { RESPONSE_PREVIEW_CHARS, ValidationError } from '@baton/core';
import chalk from 'chalk';
import ora from 'ora';

const CONTENT_PREVIEW_CHARS = 200;

const statusColors: Record<SessionStatus, (text: string) => string> = {
  idle: chalk.gray,
  running: chalk.cyan,
  paused: chalk.yellow,
  terminated: chalk.green,
  aborted: chalk.red,
  halted: chalk.magenta,
};

export function colorStatus(status: SessionStatus): string {
  return statusColors[status](status);
}

function preview(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export interface RunRendererOptions {
  /** Show an ora spinner while an agent works. Off when stderr is not a TTY. */
  spinner?: boolean;
}

/** Prints engine events as a run progresses. */
export class RunRenderer {
  private activeSpinner: ReturnType<typeof ora> | null = null;
  private readonly spinner: boolean;

  constructor(options: RunRendererOptions = {}) {
    this.spinner = options.spinner ?? process.stderr.isTTY === true;
  }

  handle(event: EngineEvent): void {
    switch (event.type) {
      case 'session.started':
        console.log(chalk.gray(`\n━━━ Session ${event.sessionId} ━━━`));
        console.log(chalk.gray(`Workflow: ${event.workflow}${event.resumed ? ' (resumed)' : ''}`));
        console.log(chalk.gray(`State:    ${event.startState}\n`));
        break;

      case 'turn.started': {
        const text = `Turn ${event.turn}: ${event.agent} in ${event.state}`;
        if (this.spinner) {
          this.activeSpinner = ora({ text: chalk.blue(`${text}...`) }).start();
        } else {
          console.log(chalk.blue(`▶ ${text}`));
        }
        break;
      }

      case 'turn.completed': {
        const text = `Turn ${event.turn}: ${event.agent} in ${event.state} (${seconds(event.durationMs)})`;
        if (this.activeSpinner) {
          this.activeSpinner.succeed(text);
          this.activeSpinner = null;
        } else {
          console.log(chalk.green(`✓ ${text}`));
        }
        if (event.content) console.log(chalk.gray(`  ${preview(event.content, CONTENT_PREVIEW_CHARS)}`));
        break;
      }

      case 'transition.taken':
        console.log(
          chalk.gray(`  → ${event.from} -> ${event.to}${event.condition ? ` (${event.condition})` : ''}`),
        );
        break;

      case 'exit.triggered':
        console.log(chalk.yellow(`  Exit condition "${event.condition}" (${event.action})`));
        break;

      case 'template.note':
        console.log(chalk.yellow(`  ! ${event.state}: ${event.note}`));
        break;

      case 'session.completed':
        this.stop(event.outcome === 'terminated');
        console.log(chalk.gray(`\n━━━ Session ${event.outcome} ━━━`));
        break;

      case 'session.failed':
        this.stop(false);
        console.log(chalk.red('\n━━━ Session aborted ━━━'));
        console.log(chalk.red(`  Turn ${event.turn} in ${event.state}: ${event.error}`));
        break;
    }
  }

  /** Settle a spinner left running (cancellation, failure). */
  stop(success = false): void {
    if (!this.activeSpinner) return;
    if (success) {
      this.activeSpinner.succeed();
    } else {
      this.activeSpinner.fail();
    }
    this.activeSpinner = null;
  }
}

export function printRunResult(result: RunResult): void {
  const outcomeColor = result.outcome === 'terminated' ? chalk.green : result.outcome === 'aborted' ? chalk.red : chalk.yellow;
  console.log(chalk.bold('\nRun Summary'));
  console.log(chalk.gray('-'.repeat(40)));
  console.log(`  Session:     ${chalk.white(result.sessionId)}`);
  console.log(`  Outcome:     ${outcomeColor(result.outcome)}`);
  console.log(`  Reason:      ${result.reason}`);
  console.log(`  Turns:       ${chalk.cyan(String(result.turnCount))}`);
  console.log(`  Final state: ${result.finalState}`);
  console.log(`  Decisions:   ${JSON.stringify(result.decisions)}`);
  if (result.sessionError !== null && !result.error) {
    console.log(chalk.yellow(`  Error flag:  ${result.sessionError}`));
  }
  if (result.error) {
    console.log(chalk.red(`  Failed turn: ${result.error.turn}`));
    if (result.error.rawResponse) {
      console.log(chalk.gray(`  Response:    ${preview(result.error.rawResponse, RESPONSE_PREVIEW_CHARS)}`));
    }
  }
  console.log(chalk.gray('-'.repeat(40)));
}

export function printSessionList(sessions: SessionSummary[]): void {
  if (sessions.length === 0) {
    console.log(chalk.gray('No sessions found.'));
    return;
  }
  for (const s of sessions) {
    console.log(
      `${chalk.white(s.sessionId)}  ${colorStatus(s.status)}  ${s.workflowName}  ${s.currentState}  turns=${s.turnCount}  ${chalk.gray(s.updatedAt)}`,
    );
  }
}

export function printSessionDetail(session: PersistedSession): void {
  console.log(chalk.bold(`Session ${session.sessionId}`));
  console.log(`  Workflow:  ${session.workflowName}`);
  console.log(`  Status:    ${colorStatus(session.status)}`);
  console.log(`  State:     ${session.currentState}`);
  console.log(`  Turns:     ${session.turnCount}`);
  console.log(`  Workspace: ${session.workspace}`);
  console.log(`  Decisions: ${JSON.stringify(session.accumulatedDecisions)}`);
  if (session.error) console.log(chalk.red(`  Error:     ${session.error}`));

  for (const turn of session.turnHistory) {
    console.log(chalk.blue(`\n#${turn.turn} ${turn.state} (${turn.agent})`));
    console.log(`  ${preview(turn.content, CONTENT_PREVIEW_CHARS)}`);
    console.log(chalk.gray(`  decisions: ${JSON.stringify(turn.decisions)}`));
  }
}

/** Print a command failure. Workflow violations are listed one per line. */
export function printError(error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Invalid workflow${error.source ? ` (${error.source})` : ''}:`));
    for (const violation of error.violations) {
      console.error(chalk.red(`  - ${violation}`));
    }
    return;
  }
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
}
