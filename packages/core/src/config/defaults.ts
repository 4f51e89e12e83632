// packages/core/src/config/defaults.ts

import type { ProjectConfig } from '../types/config.js';
import { DEFAULT_AGENT_TIMEOUT_SEC } from '../utils/constants.js';

export const DEFAULT_CONFIG: ProjectConfig = {
  project: {
    name: '',
  },
  workflowDir: 'workflows',
  workspaceDir: '.baton/workspaces',
  engine: {
    agentTimeoutSec: DEFAULT_AGENT_TIMEOUT_SEC,
    persistCheckpoints: true,
  },
  agents: {},
  advanced: {
    logLevel: 'warn',
  },
};
