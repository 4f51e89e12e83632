// packages/core/src/templates/guide.ts

/**
 * Default collaboration guide, exposed to prompts as `{{collaboration_guide}}`.
 * Callers override it per run (RunOptions.collaborationGuide) or per project
 * (`collaborationGuide` in .baton.yml).
 */
export const DEFAULT_COLLABORATION_GUIDE = `## Collaboration & Output Standards

### 1. File operations
- Deliverables (code, docs, HTML) go into the shared \`collab/\` directory.
- Act first: perform every file creation, edit and read before you reply.
- Always reference files by their full path (for example \`collab/design.md\`).

### 2. Communication
- Write to your collaborators in plain, professional language.
- State your decisions, suggestions and open questions explicitly.

### 3. Strict output format
Your reply must follow this order so the workflow can parse it:

1. File operations and reasoning. Do all edits and thinking here. Do not emit JSON yet.
2. Control signal. End the reply with exactly one JSON object and nothing after it.

\`\`\`json
{
  "content": "One-line summary of what you did",
  "decisions": {
    "key_decision_1": true,
    "key_decision_2": false
  }
}
\`\`\`
`;
