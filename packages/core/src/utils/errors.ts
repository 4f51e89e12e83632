// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A workflow definition failed validation. Carries every violation found,
 * formatted as `<path>: <message>`.
 */
export class ValidationError extends Error {
  constructor(
    public readonly violations: string[],
    public readonly source?: string,
  ) {
    const where = source ? ` in "${source}"` : '';
    super(
      `Invalid workflow definition${where} (${violations.length} violation${violations.length === 1 ? '' : 's'}):\n` +
        violations.map((v) => `  - ${v}`).join('\n'),
    );
    this.name = 'ValidationError';
  }
}

export class ConditionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly position?: number,
  ) {
    super(position === undefined ? message : `${message} at position ${position}`);
    this.name = 'ConditionSyntaxError';
  }
}

export class TemplateSyntaxError extends Error {
  constructor(
    message: string,
    public readonly offset?: number,
  ) {
    super(offset === undefined ? message : `${message} at offset ${offset}`);
    this.name = 'TemplateSyntaxError';
  }
}

/** The agent's reply did not end with a usable JSON control block. */
export class ResponseFormatError extends Error {
  constructor(
    message: string,
    public readonly rawResponse: string,
  ) {
    super(message);
    this.name = 'ResponseFormatError';
  }
}

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly agentName?: string,
    public readonly exitCode?: number,
    public readonly isTimeout = false,
  ) {
    super(message);
    this.name = 'AgentError';
  }
}

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly stateName?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}
