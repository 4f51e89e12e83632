// packages/cli/src/commands/workflows.ts

import { ValidationError, loadConfig } from '@baton/core';
import chalk from 'chalk';

import { printError } from '../render.js';
import { createWorkflowLoader } from '../utils.js';

export async function workflowsCommand(): Promise<number> {
  try {
    const config = loadConfig();
    const loader = createWorkflowLoader(config);
    const names = loader.list();
    if (names.length === 0) {
      console.log(chalk.gray(`No workflows found in ${config.workflowDir}`));
      return 0;
    }

    for (const name of names) {
      try {
        const workflow = loader.loadByName(name);
        console.log(`${chalk.white(name)}${workflow.description ? chalk.gray(`  ${workflow.description}`) : ''}`);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        console.log(`${chalk.white(name)}  ${chalk.red(`invalid (${err.violations.length} violation(s))`)}`);
      }
    }
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}
