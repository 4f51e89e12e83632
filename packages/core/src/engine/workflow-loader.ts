// packages/core/src/engine/workflow-loader.ts

import { readdirSync, readFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { compileCondition } from '../conditions/parser.js';
import { compileTemplate } from '../templates/renderer.js';
import type {
  AgentSpec,
  ExitConditionSpec,
  RawWorkflow,
  StateSpec,
  Transition,
  WorkflowDefinition,
} from '../types/workflow.js';
import { END_STATE } from '../utils/constants.js';
import { ConditionSyntaxError, TemplateSyntaxError, ValidationError } from '../utils/errors.js';

const WORKFLOW_EXTENSIONS = ['.yml', '.yaml'];

const agentSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['coder', 'architect', 'ask']),
});

const transitionSchema = z.object({
  to: z.string().min(1),
  condition: z.string().optional(),
});

const stateSchema = z.object({
  name: z.string().min(1),
  agent: z.string().min(1),
  start: z.boolean().optional(),
  prompt: z.string(),
  transitions: z.array(transitionSchema).optional(),
});

const exitConditionSchema = z.object({
  condition: z.string(),
  action: z.enum(['force_end', 'save_and_end']),
});

export const rawWorkflowSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  initial_message: z.string(),
  max_turns: z.number().int().positive(),
  agents: z.array(agentSchema).min(1),
  states: z.array(stateSchema).min(1),
  exit_conditions: z.array(exitConditionSchema).optional(),
});

// Lenient view of the same document: every field that fails to parse reads as
// absent, so cross-reference checks still run when the structure is invalid.
const looseText = z.string().optional().catch(undefined);

const looseWorkflowSchema = z
  .object({
    agents: z
      .array(z.object({ name: looseText }).catch({}))
      .optional()
      .catch(undefined),
    states: z
      .array(
        z
          .object({
            name: looseText,
            agent: looseText,
            start: z.boolean().optional().catch(undefined),
            prompt: looseText,
            transitions: z
              .array(z.object({ to: looseText, condition: looseText }).catch({}))
              .optional()
              .catch(undefined),
          })
          .catch({}),
      )
      .optional()
      .catch(undefined),
    exit_conditions: z
      .array(z.object({ condition: looseText }).catch({}))
      .optional()
      .catch(undefined),
  })
  .catch({});

type IssueSink = (path: (string | number)[], message: string) => void;

/**
 * Name uniqueness, the single start state, agent and target references, and
 * condition/template compilation, checked over whatever parts of `raw` are readable.
 */
function crossReferenceViolations(raw: unknown): string[] {
  const violations: string[] = [];
  const issue: IssueSink = (path, message) => {
    violations.push(formatViolation(path, message));
  };
  const data = looseWorkflowSchema.parse(raw);

  let agentNames: Set<string> | undefined;
  if (data.agents !== undefined) {
    const names = new Set<string>();
    data.agents.forEach((agent, i) => {
      if (agent.name === undefined) return;
      if (names.has(agent.name)) issue(['agents', i, 'name'], `Duplicate agent name "${agent.name}"`);
      names.add(agent.name);
    });
    agentNames = names;
  }

  const states = data.states ?? [];
  const stateNames = new Set<string>();
  states.forEach((state, i) => {
    if (state.name === undefined) return;
    if (state.name === END_STATE) {
      issue(['states', i, 'name'], `"${END_STATE}" is reserved and cannot name a state`);
    } else if (stateNames.has(state.name)) {
      issue(['states', i, 'name'], `Duplicate state name "${state.name}"`);
    }
    stateNames.add(state.name);
  });

  if (data.states !== undefined) {
    const startStates = states.filter((s) => s.start === true).map((s) => s.name ?? '?');
    if (startStates.length === 0) {
      issue(['states'], 'No start state: exactly one state must set start: true');
    } else if (startStates.length > 1) {
      issue(['states'], `Multiple start states (${startStates.join(', ')}): exactly one state must set start: true`);
    }
  }

  states.forEach((state, i) => {
    if (state.agent !== undefined && agentNames !== undefined && !agentNames.has(state.agent)) {
      issue(['states', i, 'agent'], `Unknown agent "${state.agent}"`);
    }
    if (state.prompt !== undefined) {
      try {
        compileTemplate(state.prompt);
      } catch (err) {
        if (!(err instanceof TemplateSyntaxError)) throw err;
        issue(['states', i, 'prompt'], err.message);
      }
    }
    (state.transitions ?? []).forEach((transition, j) => {
      if (transition.to !== undefined && transition.to !== END_STATE && !stateNames.has(transition.to)) {
        issue(['states', i, 'transitions', j, 'to'], `Unknown target state "${transition.to}"`);
      }
      checkCondition(transition.condition ?? '', ['states', i, 'transitions', j, 'condition'], issue);
    });
  });

  (data.exit_conditions ?? []).forEach((exit, i) => {
    if (exit.condition !== undefined) {
      checkCondition(exit.condition, ['exit_conditions', i, 'condition'], issue);
    }
  });

  return violations;
}

function formatViolation(path: (string | number)[], message: string): string {
  return path.length > 0 ? `${path.join('.')}: ${message}` : message;
}

function checkCondition(source: string, path: (string | number)[], issue: IssueSink): void {
  try {
    compileCondition(source);
  } catch (err) {
    if (!(err instanceof ConditionSyntaxError)) throw err;
    issue(path, err.message);
  }
}

export interface WorkflowLoaderOptions {
  /** Directory searched by loadByName() and list(). */
  workflowDir?: string;
}

/**
 * Validates raw workflow definitions and compiles them into frozen
 * WorkflowDefinitions. Every condition and prompt template is compiled here,
 * so a loaded workflow cannot hit a syntax error while running.
 */
export class WorkflowLoader {
  private readonly workflowDir: string;

  constructor(options?: WorkflowLoaderOptions) {
    this.workflowDir = options?.workflowDir ?? 'workflows';
  }

  /** Validate a parsed definition. Throws ValidationError listing every violation. */
  load(raw: unknown, source?: string): WorkflowDefinition {
    const result = rawWorkflowSchema.safeParse(raw);
    const violations = [
      ...(result.success ? [] : result.error.issues.map((i) => formatViolation(i.path, i.message))),
      ...crossReferenceViolations(raw),
    ];
    if (!result.success || violations.length > 0) {
      throw new ValidationError(violations, source);
    }
    return buildDefinition(result.data);
  }

  /** Parse YAML text and load it. */
  parse(yamlText: string, source?: string): WorkflowDefinition {
    let parsed: unknown;
    try {
      parsed = parseYaml(yamlText);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ValidationError([`Invalid YAML: ${message}`], source);
    }
    return this.load(parsed, source);
  }

  loadFile(filePath: string): WorkflowDefinition {
    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch {
      throw new ValidationError([`Workflow file not found: ${filePath}`], filePath);
    }
    return this.parse(text, filePath);
  }

  /** Load `<workflowDir>/<name>.yml` (or `.yaml`). */
  loadByName(name: string): WorkflowDefinition {
    const files = this.listFiles();
    const match = files.find((f) => stripExtension(f) === name);
    if (match === undefined) {
      throw new ValidationError(
        [`Workflow "${name}" not found in ${this.workflowDir}`],
        join(this.workflowDir, `${name}.yml`),
      );
    }
    return this.loadFile(join(this.workflowDir, match));
  }

  /** Names of workflow files in the workflow directory, sorted. */
  list(): string[] {
    return [...new Set(this.listFiles().map(stripExtension))].sort();
  }

  private listFiles(): string[] {
    try {
      return readdirSync(this.workflowDir)
        .filter((f) => WORKFLOW_EXTENSIONS.includes(extname(f)))
        .sort();
    } catch {
      return [];
    }
  }
}

function stripExtension(file: string): string {
  return basename(file, extname(file));
}

function buildDefinition(raw: RawWorkflow): WorkflowDefinition {
  const agents: AgentSpec[] = raw.agents.map((a) => Object.freeze({ name: a.name, type: a.type }));

  const states: StateSpec[] = raw.states.map((s) => {
    const transitions: Transition[] = (s.transitions ?? []).map((t) =>
      Object.freeze({ to: t.to, condition: compileCondition(t.condition ?? '') }),
    );
    return Object.freeze({
      name: s.name,
      agent: s.agent,
      start: s.start === true,
      prompt: compileTemplate(s.prompt),
      transitions: Object.freeze(transitions),
    });
  });

  const exitConditions: ExitConditionSpec[] = (raw.exit_conditions ?? []).map((e) =>
    Object.freeze({ condition: compileCondition(e.condition), action: e.action }),
  );

  const start = states.find((s) => s.start);
  if (start === undefined) {
    throw new ValidationError(['states: No start state: exactly one state must set start: true']);
  }

  return Object.freeze({
    name: raw.name,
    description: raw.description ?? '',
    initialMessage: raw.initial_message,
    maxTurns: raw.max_turns,
    agents: Object.freeze(agents),
    states: Object.freeze(states),
    exitConditions: Object.freeze(exitConditions),
    startState: start.name,
    stateIndex: new Map(states.map((s) => [s.name, s])),
    agentIndex: new Map(agents.map((a) => [a.name, a])),
  });
}
