/**
 * Dotted path parsing shared by the tokenizer and the resolver.
 */
import type { DottedPath } from './types.js';

const IDENTIFIER = /^[A-Za-z0-9_]+$/;
const DOTTED_PATH = /^[A-Za-z0-9_]+(?:\.[A-Za-z0-9_]+)*$/;

export function isIdentifier(text: string): boolean {
  return IDENTIFIER.test(text);
}

/**
 * Split `a.b.c` into segments. Returns undefined for anything that is not
 * identifier segments joined by single dots.
 */
export function parsePath(text: string): DottedPath | undefined {
  if (!DOTTED_PATH.test(text)) {
    return undefined;
  }
  return Object.freeze(text.split('.'));
}

export function formatPath(path: DottedPath): string {
  return path.join('.');
}
