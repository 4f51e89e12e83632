// packages/core/src/agents/cli-agent.ts -- Agent proxy that runs a CLI subprocess per turn

import { spawn } from 'node:child_process';
import type { AgentProxy, AgentReply, AgentRequest } from '../types/agents.js';
import type { AgentCommandConfig } from '../types/config.js';
import type { AgentType } from '../types/workflow.js';
import {
  DEFAULT_AGENT_TIMEOUT_SEC,
  KILL_GRACE_MS,
  MAX_AGENT_OUTPUT_BYTES,
  MAX_STDERR_CHARS,
} from '../utils/constants.js';
import { AgentError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

const TRUNCATION_MARKER = '[TRUNCATED: earlier agent output exceeded limit]\n';

// Default env vars always passed to agent subprocesses
const BASE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'TEMP',
  'TMP',
  'USERPROFILE',
  'SystemRoot',
  'COMSPEC',
  'SHELL',
  'LANG',
];

export interface CliAgentProxyOptions {
  agents: Partial<Record<AgentType, AgentCommandConfig>>;
  /** Used when an agent entry has no timeout of its own. */
  defaultTimeoutSec?: number;
  logger?: Logger;
}

/**
 * Runs the command configured for the agent's type with the workspace as cwd.
 * The prompt goes to stdin; stdout is the reply.
 */
export class CliAgentProxy implements AgentProxy {
  private readonly agents: Partial<Record<AgentType, AgentCommandConfig>>;
  private readonly defaultTimeoutSec: number;
  private readonly logger: Logger;

  constructor(options: CliAgentProxyOptions) {
    this.agents = options.agents;
    this.defaultTimeoutSec = options.defaultTimeoutSec ?? DEFAULT_AGENT_TIMEOUT_SEC;
    this.logger = options.logger ?? silentLogger;
  }

  async invoke(request: AgentRequest, signal?: AbortSignal): Promise<AgentReply> {
    const config = this.agents[request.agentType];
    if (config === undefined) {
      throw new AgentError(
        `No command configured for agent type "${request.agentType}" (agent "${request.agentName}")`,
        request.agentName,
      );
    }

    const env = buildFilteredEnv([...BASE_ENV_ALLOWLIST, ...(config.envAllowlist ?? [])]);
    const timeoutMs = (config.timeout ?? this.defaultTimeoutSec) * 1000;
    const maxBytes = config.maxOutputBytes ?? MAX_AGENT_OUTPUT_BYTES;

    this.logger.debug(`Spawning "${config.command}" for agent "${request.agentName}" in ${request.workspace}`);
    const start = Date.now();
    const stdout = await this.runProcess(request, config, env, timeoutMs, maxBytes, signal);
    this.logger.debug(`Agent "${request.agentName}" replied in ${Date.now() - start}ms`);
    return { text: stdout };
  }

  private runProcess(
    request: AgentRequest,
    config: AgentCommandConfig,
    env: Record<string, string>,
    timeoutMs: number,
    maxBytes: number,
    signal?: AbortSignal,
  ): Promise<string> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AgentError(`Agent "${request.agentName}" was aborted before start`, request.agentName));
        return;
      }

      const startTime = Date.now();
      const child = spawn(config.command, config.args, {
        cwd: request.workspace,
        env,
        stdio: ['pipe', 'pipe', 'pipe'],
        windowsHide: true,
        detached: process.platform !== 'win32',
        shell: process.platform === 'win32',
      });

      const chunks: Buffer[] = [];
      let stdoutBytes = 0;
      let truncated = false;
      let stderr = '';
      let settled = false;

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const fail = (err: AgentError): void => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const timer = setTimeout(() => {
        killProcessTree(child.pid);
        fail(
          new AgentError(
            `Agent "${request.agentName}" timed out (limit ${timeoutMs}ms, elapsed ${Date.now() - startTime}ms)`,
            request.agentName,
            undefined,
            true,
          ),
        );
      }, timeoutMs);

      function onAbort(): void {
        killProcessTree(child.pid);
        fail(new AgentError(`Agent "${request.agentName}" was aborted`, request.agentName));
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      // The control block comes last, so keep the tail of stdout.
      child.stdout.on('data', (data: Buffer) => {
        chunks.push(data);
        stdoutBytes += data.byteLength;
        while (stdoutBytes > maxBytes) {
          const head = chunks[0];
          const excess = stdoutBytes - maxBytes;
          if (head.byteLength <= excess) {
            chunks.shift();
            stdoutBytes -= head.byteLength;
          } else {
            chunks[0] = head.subarray(excess);
            stdoutBytes -= excess;
          }
          truncated = true;
        }
      });
      child.stderr.on('data', (data: Buffer) => {
        if (stderr.length < MAX_STDERR_CHARS) stderr += data.toString();
      });

      // EPIPE means the command exited without reading the whole prompt; 'close' reports it.
      child.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EPIPE') {
          this.logger.debug(`Agent "${request.agentName}" closed stdin before reading the prompt`);
          return;
        }
        killProcessTree(child.pid);
        fail(new AgentError(`Agent "${request.agentName}" stdin failed: ${err.message}`, request.agentName));
      });
      child.stdin.write(request.prompt);
      child.stdin.end();

      child.on('error', (err) => {
        fail(new AgentError(`Agent subprocess failed: ${err.message}`, request.agentName));
      });

      child.on('close', (code) => {
        if (settled) return;
        if (code !== 0) {
          fail(
            new AgentError(
              `Agent "${request.agentName}" exited with code ${code}: ${stderr.slice(0, 500)}`,
              request.agentName,
              code ?? undefined,
            ),
          );
          return;
        }
        settled = true;
        cleanup();
        let output = Buffer.concat(chunks).toString('utf-8');
        if (truncated) {
          this.logger.warn(`Agent "${request.agentName}" output truncated to its last ${maxBytes} bytes`);
          output = TRUNCATION_MARKER + output;
        }
        resolve(output);
      });
    });
  }
}

export function buildFilteredEnv(allowlist: string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}

/** SIGTERM the process group, then SIGKILL after a grace period. */
export function killProcessTree(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    if (process.platform === 'win32') {
      spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore' });
    } else {
      process.kill(-pid, 'SIGTERM');
      setTimeout(() => {
        try {
          process.kill(-pid, 'SIGKILL');
        } catch {
          // Process may already be dead
        }
      }, KILL_GRACE_MS).unref();
    }
  } catch {
    // Process may already be dead
  }
}
