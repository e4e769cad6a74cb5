/**
 * Template token and option type definitions.
 */
import type { SourcePosition } from '../../utils/errors.js';

/** Dotted path split into segments, e.g. `paper.title` → ['paper', 'title']. */
export type DottedPath = readonly string[];

/** Half-open index range `[start, end)` over a token sequence. */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export interface LiteralToken {
  readonly kind: 'literal';
  readonly text: string;
  readonly position: SourcePosition;
}

export interface EscapedLiteralToken {
  readonly kind: 'escaped';
  /** Delimiters and enclosed text, without the escape marker */
  readonly text: string;
  readonly position: SourcePosition;
}

export interface PlaceholderToken {
  readonly kind: 'placeholder';
  readonly path: DottedPath;
  readonly position: SourcePosition;
}

export interface LoopStartToken {
  readonly kind: 'loopStart';
  readonly path: DottedPath;
  readonly binding: string;
  /** Body tokens; `body.end` is the index of the matching LoopEnd */
  readonly body: Span;
  readonly position: SourcePosition;
}

export interface LoopEndToken {
  readonly kind: 'loopEnd';
  /** Index of the matching LoopStart */
  readonly start: number;
  readonly position: SourcePosition;
}

export type Token =
  | LiteralToken
  | EscapedLiteralToken
  | PlaceholderToken
  | LoopStartToken
  | LoopEndToken;

export type TokenKind = Token['kind'];

/** Flat, frozen token sequence produced by the tokenizer. */
export type TokenSequence = readonly Token[];

/**
 * Options for a render call.
 */
export interface RenderOptions {
  /** Maximum number of tokens processed before failing with Timeout */
  maxSteps?: number;
}

/** Default step budget for a render call. */
export const DEFAULT_MAX_STEPS = 10_000_000;
