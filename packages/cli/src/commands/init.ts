// packages/cli/src/commands/init.ts

import { existsSync } from 'node:fs';
import { basename, join } from 'node:path';

import { CONFIG_FILENAME, loadConfig, writeConfig } from '@baton/core';
import chalk from 'chalk';

import { printError } from '../render.js';

interface InitOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<number> {
  const cwd = process.cwd();
  if (existsSync(join(cwd, CONFIG_FILENAME)) && !options.force) {
    console.error(chalk.red('Already initialized. Use --force to overwrite.'));
    return 1;
  }

  try {
    const config = loadConfig({ projectDir: cwd, skipFile: options.force });
    config.project.name = basename(cwd);
    writeConfig(config, cwd);
  } catch (error) {
    printError(error);
    return 1;
  }

  console.log(chalk.green(`Initialized ${CONFIG_FILENAME} in ${cwd}`));
  console.log(chalk.gray('  Set agents.<type>.command in .baton.yml before running.'));
  console.log(chalk.gray('\nNext: baton run <workflow> --message "describe your task"'));
  return 0;
}
