// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { CONFIG_FILENAME, STATE_DIRNAME } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: ProjectConfig[K] extends object ? Partial<ProjectConfig[K]> : ProjectConfig[K];
};

/**
 * Load config with precedence: overrides > .baton.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .baton.yml from projectDir on top
 * 3. Merge programmatic overrides on top
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = deepMerge({}, structuredClone(DEFAULT_CONFIG));

  // Layer 2: Project file (.baton.yml)
  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
  }

  // Layer 3: Programmatic overrides
  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/**
 * Write a ProjectConfig to .baton.yml in the given directory.
 * Also creates .baton/db/ and the workspace directory.
 */
export function writeConfig(config: ProjectConfig, dir: string): void {
  const configPath = join(dir, CONFIG_FILENAME);
  const yamlContent = stringifyYaml(config, { lineWidth: 100 });
  writeFileSync(configPath, yamlContent, 'utf-8');

  mkdirSync(join(dir, STATE_DIRNAME, 'db'), { recursive: true });
  mkdirSync(join(dir, config.workspaceDir), { recursive: true });

  // Append to .gitignore if not already there
  const gitignorePath = join(dir, '.gitignore');
  const entry = `${STATE_DIRNAME}/`;
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.includes(entry)) {
      appendFileSync(gitignorePath, `\n${entry}\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${entry}\n`, 'utf-8');
  }
}

export { deepMerge };
