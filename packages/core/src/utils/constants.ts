// packages/core/src/utils/constants.ts -- Shared magic number constants

/** Reserved transition target that ends a run */
export const END_STATE = 'END';

/** Default per-turn agent timeout in seconds */
export const DEFAULT_AGENT_TIMEOUT_SEC = 600;

/** Max captured stdout from a CLI agent */
export const MAX_AGENT_OUTPUT_BYTES = 512 * 1024;

/** Max stderr kept for error messages */
export const MAX_STDERR_CHARS = 10_000;

/** Grace period between SIGTERM and SIGKILL */
export const KILL_GRACE_MS = 5000;

/** Preview length used when printing raw responses */
export const RESPONSE_PREVIEW_CHARS = 500;

/** Config file name looked up in the project directory */
export const CONFIG_FILENAME = '.baton.yml';

/** Project state directory (database, workspaces) */
export const STATE_DIRNAME = '.baton';
