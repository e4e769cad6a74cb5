/**
 * Template engine entry points: compile once, render many times.
 */
import { formatPath } from './path.js';
import { renderTokens } from './renderer.js';
import { tokenize } from './tokenizer.js';
import { DEFAULT_MAX_STEPS } from './types.js';
import type { RenderOptions, TokenSequence } from './types.js';
import type { TemplateContext } from './context.js';

/**
 * Summary of what a template references, without rendering it.
 */
export interface TemplateOutline {
  /** Distinct placeholder paths, in order of first appearance */
  placeholders: string[];
  /** Distinct loop source paths, in order of first appearance */
  loops: string[];
  /** Number of {{each}} blocks */
  loopCount: number;
  /** Number of escaped tags */
  escapedCount: number;
}

/**
 * A tokenized template. Immutable; safe to render concurrently.
 */
export class CompiledTemplate {
  constructor(
    readonly tokens: TokenSequence,
    private readonly defaults: RenderOptions = {}
  ) {}

  render(context: TemplateContext, options: RenderOptions = {}): string {
    return renderTokens(this.tokens, context, { maxSteps: options.maxSteps ?? this.defaults.maxSteps });
  }

  outline(): TemplateOutline {
    const placeholders = new Set<string>();
    const loops = new Set<string>();
    let loopCount = 0;
    let escapedCount = 0;

    for (const token of this.tokens) {
      if (token.kind === 'placeholder') {
        placeholders.add(formatPath(token.path));
      } else if (token.kind === 'loopStart') {
        loops.add(formatPath(token.path));
        loopCount++;
      } else if (token.kind === 'escaped') {
        escapedCount++;
      }
    }

    return { placeholders: [...placeholders], loops: [...loops], loopCount, escapedCount };
  }
}

export interface TemplateEngineOptions {
  /** Default step budget for every render */
  maxSteps?: number;
}

/**
 * Template engine holding default render options.
 */
export class TemplateEngine {
  private readonly maxSteps: number;

  constructor(options: TemplateEngineOptions = {}) {
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  compile(template: string): CompiledTemplate {
    return new CompiledTemplate(tokenize(template), { maxSteps: this.maxSteps });
  }

  render(template: string, context: TemplateContext, options: RenderOptions = {}): string {
    return this.compile(template).render(context, options);
  }
}

/**
 * Tokenize a template for repeated rendering.
 */
export function compile(template: string, options: RenderOptions = {}): CompiledTemplate {
  return new CompiledTemplate(tokenize(template), options);
}

/**
 * Render a template string against a context.
 */
export function render(template: string, context: TemplateContext, options: RenderOptions = {}): string {
  return compile(template).render(context, options);
}
