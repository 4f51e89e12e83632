// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';
import type { AgentType } from './workflow.js';

export interface AgentCommandConfig {
  command: string;
  args: string[];
  /** Seconds. Falls back to engine.agentTimeoutSec. */
  timeout?: number;
  maxOutputBytes?: number;
  envAllowlist?: string[];
}

export interface EngineConfig {
  agentTimeoutSec: number;
  persistCheckpoints: boolean;
}

export interface ProjectConfig {
  project: {
    name: string;
  };
  workflowDir: string;
  workspaceDir: string;
  collaborationGuide?: string;
  engine: EngineConfig;
  agents: Partial<Record<AgentType, AgentCommandConfig>>;
  advanced: {
    logLevel: LogLevel;
  };
}
