// packages/core/src/types/agents.ts

import type { WorkspaceHandle } from './session.js';
import type { AgentType } from './workflow.js';

export interface AgentRequest {
  agentName: string;
  agentType: AgentType;
  workspace: WorkspaceHandle;
  prompt: string;
}

export interface AgentReply {
  text: string;
}

/**
 * Turns a rendered prompt into free text. Implementations should stop work
 * when `signal` aborts (cancellation or per-turn timeout).
 */
export interface AgentProxy {
  invoke(request: AgentRequest, signal?: AbortSignal): Promise<AgentReply>;
}
