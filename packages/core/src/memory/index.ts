// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { SessionStore } from './session-store.js';
export type { SessionListFilter } from './session-store.js';
export {
  fromSessionJson,
  parseSessionJson,
  sessionJsonSchema,
  sessionStatusSchema,
  toSessionJson,
} from './session-codec.js';
export type { SessionJson } from './session-codec.js';
