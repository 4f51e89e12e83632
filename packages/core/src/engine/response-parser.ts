// packages/core/src/engine/response-parser.ts

import { z } from 'zod';
import type { DecisionValue, Decisions } from '../types/values.js';
import { ResponseFormatError } from '../utils/errors.js';

export const decisionValueSchema: z.ZodType<DecisionValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(decisionValueSchema),
    z.record(z.string(), decisionValueSchema),
  ]),
);

export const decisionsSchema = z.record(z.string(), decisionValueSchema);

const controlBlockSchema = z.object({
  content: z.string(),
  decisions: decisionsSchema,
});

export interface ControlBlock {
  content: string;
  decisions: Decisions;
}

/**
 * Extract the trailing `{"content": ..., "decisions": {...}}` block from an
 * agent reply. Candidates are tried from the last `{` backwards; the first
 * balanced object that parses and carries both keys is the control block.
 */
export function extractControlBlock(text: string): ControlBlock {
  for (let start = text.lastIndexOf('{'); start >= 0; start = start > 0 ? text.lastIndexOf('{', start - 1) : -1) {
    const end = findObjectEnd(text, start);
    if (end < 0) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text.slice(start, end + 1));
    } catch {
      continue;
    }
    if (!hasControlKeys(parsed)) continue;

    const result = controlBlockSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ResponseFormatError(`Invalid control block: ${issues}`, text);
    }
    return result.data;
  }

  throw new ResponseFormatError(
    'No JSON control block with "content" and "decisions" found at the end of the agent response',
    text,
  );
}

function hasControlKeys(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'content' in value &&
    'decisions' in value
  );
}

/** Index of the `}` closing the object opened at `start`, or -1. Skips braces inside strings. */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
