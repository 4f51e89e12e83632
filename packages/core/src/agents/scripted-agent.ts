// packages/core/src/agents/scripted-agent.ts

import type { AgentProxy, AgentReply, AgentRequest } from '../types/agents.js';
import { AgentError } from '../utils/errors.js';

export type ScriptedResponse = string | ((request: AgentRequest) => string | Promise<string>);

/**
 * Replays canned replies per agent name, in order. Useful for tests and for
 * dry runs of a workflow without a real backend.
 */
export class ScriptedAgentProxy implements AgentProxy {
  readonly requests: AgentRequest[] = [];
  private readonly queues: Map<string, ScriptedResponse[]>;

  constructor(script: Readonly<Record<string, readonly ScriptedResponse[]>>) {
    this.queues = new Map(Object.entries(script).map(([agent, replies]) => [agent, [...replies]]));
  }

  async invoke(request: AgentRequest, signal?: AbortSignal): Promise<AgentReply> {
    if (signal?.aborted) {
      throw new AgentError(`Agent "${request.agentName}" was aborted`, request.agentName);
    }
    this.requests.push(request);
    const next = this.queues.get(request.agentName)?.shift();
    if (next === undefined) {
      throw new AgentError(`No scripted reply left for agent "${request.agentName}"`, request.agentName);
    }
    const text = typeof next === 'string' ? next : await next(request);
    return { text };
  }

  /** Replies not consumed yet for one agent. */
  remaining(agentName: string): number {
    return this.queues.get(agentName)?.length ?? 0;
  }
}
