// packages/cli/src/commands/validate.ts

import { loadConfig } from '@baton/core';
import chalk from 'chalk';

import { printError } from '../render.js';
import { resolveWorkflow } from '../utils.js';

export async function validateCommand(workflowRef: string): Promise<number> {
  try {
    const workflow = resolveWorkflow(workflowRef, loadConfig());
    console.log(
      chalk.green(
        `✓ ${workflow.name}: ${workflow.states.length} state(s), ${workflow.agents.length} agent(s), max_turns ${workflow.maxTurns}`,
      ),
    );
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}
