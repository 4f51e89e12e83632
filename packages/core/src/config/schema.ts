// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { ProjectConfig } from '../types/config.js';
import { DEFAULT_AGENT_TIMEOUT_SEC } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const agentCommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeout: z.number().positive().optional(),
  maxOutputBytes: z.number().int().positive().optional(),
  envAllowlist: z.array(z.string()).optional(),
});

const engineConfigSchema = z.object({
  agentTimeoutSec: z.number().positive().default(DEFAULT_AGENT_TIMEOUT_SEC),
  persistCheckpoints: z.boolean().default(true),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
});

export const projectConfigSchema = z
  .object({
    project: z
      .object({
        name: z.string().default(''),
      })
      .default({}),
    workflowDir: z.string().min(1).default('workflows'),
    workspaceDir: z.string().min(1).default('.baton/workspaces'),
    collaborationGuide: z.string().optional(),
    engine: engineConfigSchema.default({}),
    agents: z
      .object({
        coder: agentCommandSchema.optional(),
        architect: agentCommandSchema.optional(),
        ask: agentCommandSchema.optional(),
      })
      .strict()
      .default({}),
    advanced: advancedConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    for (const [type, agent] of Object.entries(data.agents)) {
      if (agent?.timeout !== undefined && agent.timeout > data.engine.agentTimeoutSec * 10) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['agents', type, 'timeout'],
          message: `Timeout ${agent.timeout}s for "${type}" is more than ten times engine.agentTimeoutSec (${data.engine.agentTimeoutSec}s)`,
        });
      }
    }
  });

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): ProjectConfig {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const first = result.error.issues[0];
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, first?.path.join('.'));
  }
  return result.data;
}
