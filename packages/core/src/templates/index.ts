// packages/core/src/templates -- Prompt templating

export { compileTemplate, formatValue, PromptRenderer } from './renderer.js';
export type { PromptRendererOptions, RenderResult } from './renderer.js';
export { DEFAULT_COLLABORATION_GUIDE } from './guide.js';
