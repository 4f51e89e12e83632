// packages/core/src/agents/index.ts -- barrel re-export

export { CliAgentProxy, buildFilteredEnv, killProcessTree } from './cli-agent.js';
export type { CliAgentProxyOptions } from './cli-agent.js';
export { ScriptedAgentProxy } from './scripted-agent.js';
export type { ScriptedResponse } from './scripted-agent.js';
