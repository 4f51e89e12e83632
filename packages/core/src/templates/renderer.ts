// packages/core/src/templates/renderer.ts

import type { CompiledTemplate, TemplateSegment } from '../types/workflow.js';
import type { DecisionValue, Decisions } from '../types/values.js';
import { resolvePath } from '../conditions/evaluator.js';
import { TemplateSyntaxError } from '../utils/errors.js';
import { DEFAULT_COLLABORATION_GUIDE } from './guide.js';

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;
const IF_PATTERN = /^if\s+([A-Za-z_][A-Za-z0-9_.]*)\s*==\s*(?:"([^"]*)"|'([^']*)')$/;

interface OpenBlock {
  name: string;
  literal: string;
  then: TemplateSegment[];
  otherwise: TemplateSegment[];
  inElse: boolean;
  offset: number;
}

/**
 * Compile a prompt template.
 *
 * Supports `{{ name }}` and one non-nesting conditional:
 * `{% if name == "literal" %} ... {% else %} ... {% endif %}`.
 */
export function compileTemplate(source: string): CompiledTemplate {
  const root: TemplateSegment[] = [];
  let block: OpenBlock | null = null;
  let pos = 0;

  const target = (): TemplateSegment[] =>
    block === null ? root : block.inElse ? block.otherwise : block.then;

  const pushText = (text: string): void => {
    if (text.length > 0) target().push({ kind: 'text', text });
  };

  while (pos < source.length) {
    const nextVar = source.indexOf('{{', pos);
    const nextTag = source.indexOf('{%', pos);
    const candidates = [nextVar, nextTag].filter((i) => i >= 0);
    if (candidates.length === 0) {
      pushText(source.slice(pos));
      break;
    }

    const start = Math.min(...candidates);
    pushText(source.slice(pos, start));
    const isVar = start === nextVar;
    const close = source.indexOf(isVar ? '}}' : '%}', start + 2);
    if (close < 0) {
      throw new TemplateSyntaxError(`Unclosed "${isVar ? '{{' : '{%'}"`, start);
    }
    const body = source.slice(start + 2, close).trim();
    pos = close + 2;

    if (isVar) {
      if (!NAME_PATTERN.test(body)) {
        throw new TemplateSyntaxError(`Invalid variable name "${body}"`, start);
      }
      target().push({ kind: 'var', name: body });
      continue;
    }

    if (body.startsWith('if ') || body === 'if') {
      if (block !== null) {
        throw new TemplateSyntaxError('Nested {% if %} blocks are not supported', start);
      }
      const match = IF_PATTERN.exec(body);
      if (!match) {
        throw new TemplateSyntaxError(`Malformed condition "{% ${body} %}": expected name == "literal"`, start);
      }
      block = {
        name: match[1],
        literal: match[2] ?? match[3] ?? '',
        then: [],
        otherwise: [],
        inElse: false,
        offset: start,
      };
    } else if (body === 'else') {
      if (block === null) {
        throw new TemplateSyntaxError('{% else %} without a matching {% if %}', start);
      }
      if (block.inElse) {
        throw new TemplateSyntaxError('Duplicate {% else %} in one {% if %} block', start);
      }
      block.inElse = true;
    } else if (body === 'endif') {
      if (block === null) {
        throw new TemplateSyntaxError('{% endif %} without a matching {% if %}', start);
      }
      root.push({
        kind: 'if',
        name: block.name,
        literal: block.literal,
        then: block.then,
        otherwise: block.otherwise,
      });
      block = null;
    } else {
      throw new TemplateSyntaxError(`Unknown tag "{% ${body} %}"`, start);
    }
  }

  if (block !== null) {
    throw new TemplateSyntaxError('Unclosed {% if %} block (missing {% endif %})', block.offset);
  }

  return { source, segments: root };
}

export interface RenderResult {
  text: string;
  /** Non-fatal rendering notes, e.g. missing variables. */
  notes: string[];
}

export interface PromptRendererOptions {
  collaborationGuide?: string;
}

/**
 * Renders compiled templates. The collaboration guide is fixed at construction
 * and exposed as `collaboration_guide` unless the variables already carry one.
 */
export class PromptRenderer {
  readonly collaborationGuide: string;

  constructor(options?: PromptRendererOptions) {
    this.collaborationGuide = options?.collaborationGuide ?? DEFAULT_COLLABORATION_GUIDE;
  }

  render(template: CompiledTemplate, variables: Readonly<Decisions>): RenderResult {
    const scope: Decisions = { collaboration_guide: this.collaborationGuide, ...variables };
    const notes: string[] = [];
    const text = renderSegments(template.segments, scope, notes);
    return { text, notes: [...new Set(notes)] };
  }
}

function renderSegments(segments: TemplateSegment[], scope: Readonly<Decisions>, notes: string[]): string {
  let out = '';
  for (const segment of segments) {
    switch (segment.kind) {
      case 'text':
        out += segment.text;
        break;
      case 'var': {
        const value = resolvePath(scope, segment.name);
        if (value === undefined) {
          notes.push(`Missing template variable "${segment.name}"`);
        } else {
          out += formatValue(value);
        }
        break;
      }
      case 'if': {
        const value = resolvePath(scope, segment.name);
        const matches = value !== undefined && formatValue(value) === segment.literal;
        out += renderSegments(matches ? segment.then : segment.otherwise, scope, notes);
        break;
      }
    }
  }
  return out;
}

/** Text form of a value inside a prompt. */
export function formatValue(value: DecisionValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
