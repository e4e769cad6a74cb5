/**
 * Token-sequence renderer.
 *
 * A single loop over the flat token array. Active `{{each}}` blocks live on
 * an explicit frame stack, so nesting depth never grows the call stack.
 */
import { TemplateError } from '../../utils/errors.js';
import type { TemplateContext } from './context.js';
import { resolveList, resolveScalar, stringifyScalar } from './resolver.js';
import type { Overlay } from './resolver.js';
import { DEFAULT_MAX_STEPS } from './types.js';
import type { RenderOptions, Span, TokenSequence } from './types.js';
import type { Value } from './value.js';

interface LoopFrame {
  readonly binding: string;
  readonly items: readonly Value[];
  readonly body: Span;
  index: number;
}

/**
 * Loop frames as an overlay, searched innermost first.
 */
class FrameOverlay implements Overlay {
  readonly frames: LoopFrame[] = [];

  lookup(name: string): Value | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame.binding === name) {
        return frame.items[frame.index];
      }
    }
    return undefined;
  }

  top(): LoopFrame | undefined {
    return this.frames[this.frames.length - 1];
  }
}

/**
 * Render a token sequence against a context.
 *
 * Each processed token costs one step; a loop body is re-processed for every
 * element. Output is returned only when the whole sequence renders.
 *
 * @throws TemplateError UnknownKey, TypeMismatch or Timeout
 */
export function renderTokens(
  tokens: TokenSequence,
  context: TemplateContext,
  options: RenderOptions = {}
): string {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isInteger(maxSteps) || maxSteps < 0) {
    throw new RangeError(`maxSteps must be a non-negative integer, got ${maxSteps}`);
  }

  const root = context.root;
  const overlay = new FrameOverlay();
  const output: string[] = [];
  let steps = 0;
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];
    if (steps >= maxSteps) {
      throw TemplateError.timeout(maxSteps, token.position);
    }
    steps++;

    switch (token.kind) {
      case 'literal':
      case 'escaped':
        output.push(token.text);
        i++;
        break;

      case 'placeholder': {
        const value = resolveScalar(token.path, root, overlay, token.position);
        output.push(stringifyScalar(value));
        i++;
        break;
      }

      case 'loopStart': {
        const source = resolveList(token.path, root, overlay, token.position);
        if (source.items.length === 0) {
          // Skip the body and its LoopEnd
          i = token.body.end + 1;
          break;
        }
        overlay.frames.push({ binding: token.binding, items: source.items, body: token.body, index: 0 });
        i = token.body.start;
        break;
      }

      case 'loopEnd': {
        const frame = overlay.top();
        if (!frame) {
          throw new Error(`Internal renderer error: loop end at token ${i} without an active frame`);
        }
        frame.index++;
        if (frame.index < frame.items.length) {
          i = frame.body.start;
        } else {
          overlay.frames.pop();
          i++;
        }
        break;
      }
    }
  }

  return output.join('');
}
