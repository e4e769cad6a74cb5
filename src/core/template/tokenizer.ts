/**
 * Template tokenizer.
 *
 * One forward scan over the template text. Literal runs, escaped tags,
 * placeholders and loop boundaries become a flat token array; loop bodies
 * are recorded as index spans so the renderer never re-scans text.
 */
import { TemplateError } from '../../utils/errors.js';
import type { SourcePosition } from '../../utils/errors.js';
import { formatPath, isIdentifier, parsePath } from './path.js';
import type { DottedPath, LoopStartToken, Token, TokenSequence } from './types.js';

const OPEN = '{{';
const CLOSE = '}}';
const BACKSLASH = 0x5c;
const LOOP_KEYWORD = /^each(?:\s|$)/;
const LOOP_HEADER = /^each\s+([^\s|]+)\s*\|([^|]*)\|$/;
const LOOP_END = '/each';

/**
 * Tracks line and column for offsets visited in increasing order.
 */
class LineTracker {
  private line = 1;
  private lineStart = 0;
  private scanned = 0;

  constructor(private readonly text: string) {}

  positionAt(offset: number): SourcePosition {
    let newline = this.text.indexOf('\n', this.scanned);
    while (newline !== -1 && newline < offset) {
      this.line++;
      this.lineStart = newline + 1;
      newline = this.text.indexOf('\n', newline + 1);
    }
    this.scanned = Math.max(this.scanned, offset);
    return Object.freeze({ offset, line: this.line, column: offset - this.lineStart + 1 });
  }
}

interface OpenLoop {
  index: number;
  path: DottedPath;
}

/**
 * Tokenize template text.
 *
 * @throws TemplateError for unterminated tags, unbalanced loops and tags
 *   that are neither a placeholder nor a loop boundary
 */
export function tokenize(text: string): TokenSequence {
  const lines = new LineTracker(text);
  const tokens: Token[] = [];
  const openLoops: OpenLoop[] = [];

  let pendingText = '';
  let pendingStart = 0;

  const appendLiteral = (chunk: string, start: number): void => {
    if (chunk === '') return;
    if (pendingText === '') pendingStart = start;
    pendingText += chunk;
  };

  const flushLiteral = (): void => {
    if (pendingText === '') return;
    tokens.push(Object.freeze({
      kind: 'literal',
      text: pendingText,
      position: lines.positionAt(pendingStart),
    }));
    pendingText = '';
  };

  let cursor = 0;
  while (cursor < text.length) {
    const tagStart = text.indexOf(OPEN, cursor);
    if (tagStart === -1) {
      appendLiteral(text.slice(cursor), cursor);
      break;
    }

    let backslashes = 0;
    while (tagStart - backslashes > cursor && text.charCodeAt(tagStart - backslashes - 1) === BACKSLASH) {
      backslashes++;
    }
    // Each backslash pair collapses to one literal backslash
    appendLiteral(text.slice(cursor, tagStart - backslashes) + '\\'.repeat(backslashes >> 1), cursor);

    const closeAt = text.indexOf(CLOSE, tagStart + OPEN.length);

    if (backslashes % 2 === 1) {
      flushLiteral();
      const position = lines.positionAt(tagStart - 1);
      if (closeAt === -1) {
        throw TemplateError.unterminatedPlaceholder(position, true);
      }
      tokens.push(Object.freeze({
        kind: 'escaped',
        text: text.slice(tagStart, closeAt + CLOSE.length),
        position,
      }));
      cursor = closeAt + CLOSE.length;
      continue;
    }

    flushLiteral();
    const position = lines.positionAt(tagStart);
    if (closeAt === -1) {
      throw TemplateError.unterminatedPlaceholder(position);
    }

    const content = text.slice(tagStart + OPEN.length, closeAt).trim();
    if (content === LOOP_END) {
      closeLoop(tokens, openLoops, position);
    } else if (LOOP_KEYWORD.test(content)) {
      openLoop(tokens, openLoops, content, position);
    } else {
      const path = parsePath(content);
      if (!path) {
        throw TemplateError.invalidSyntax(describeInvalidTag(content), position);
      }
      tokens.push(Object.freeze({ kind: 'placeholder', path, position }));
    }
    cursor = closeAt + CLOSE.length;
  }
  flushLiteral();

  if (openLoops.length > 0) {
    const outermost = openLoops[0];
    throw TemplateError.unterminatedLoop(formatPath(outermost.path), tokens[outermost.index].position);
  }

  return Object.freeze(tokens);
}

function openLoop(tokens: Token[], openLoops: OpenLoop[], content: string, position: SourcePosition): void {
  const match = LOOP_HEADER.exec(content);
  const path = match ? parsePath(match[1]) : undefined;
  const binding = match ? match[2].trim() : '';
  if (!path || !isIdentifier(binding)) {
    throw TemplateError.invalidSyntax(
      `expected {{each <path> |<name>|}}, found {{${content}}}`,
      position
    );
  }

  const index = tokens.length;
  // Provisional body span; replaced once the matching {{/each}} is found
  tokens.push(loopStart(path, binding, index + 1, index + 1, position));
  openLoops.push({ index, path });
}

function closeLoop(tokens: Token[], openLoops: OpenLoop[], position: SourcePosition): void {
  const open = openLoops.pop();
  if (!open) {
    throw TemplateError.unmatchedLoopEnd(position);
  }

  const endIndex = tokens.length;
  const start = tokens[open.index];
  if (start.kind !== 'loopStart') {
    throw new Error(`Internal tokenizer error: token ${open.index} is not a loop start`);
  }
  tokens[open.index] = loopStart(start.path, start.binding, open.index + 1, endIndex, start.position);
  tokens.push(Object.freeze({ kind: 'loopEnd', start: open.index, position }));
}

function loopStart(
  path: DottedPath,
  binding: string,
  bodyStart: number,
  bodyEnd: number,
  position: SourcePosition
): LoopStartToken {
  return Object.freeze({
    kind: 'loopStart',
    path,
    binding,
    body: Object.freeze({ start: bodyStart, end: bodyEnd }),
    position,
  });
}

function describeInvalidTag(content: string): string {
  if (content === '') {
    return 'empty placeholder {{}}';
  }
  if (content.startsWith('/')) {
    return `unknown closing tag {{${content}}}`;
  }
  return `invalid placeholder {{${content}}}; expected a dotted key such as {{paper.title}}`;
}
