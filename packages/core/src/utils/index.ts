// packages/core/src/utils/index.ts -- barrel re-export

export { generateSessionId } from './id.js';
export {
  AgentError,
  ConditionSyntaxError,
  ConfigError,
  DatabaseError,
  ResponseFormatError,
  TemplateSyntaxError,
  ValidationError,
  WorkflowError,
} from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
