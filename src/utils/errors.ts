/**
 * Error types and codes for docstamp.
 * All errors extend DocstampError so callers can match on `code`.
 */

/**
 * Base error class for all docstamp errors.
 */
export class DocstampError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocstampError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration and input-data errors (config file, data files, CLI overrides).
 */
export class ConfigError extends DocstampError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends DocstampError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Template errors (T001-T007)
  UNTERMINATED_PLACEHOLDER: 'T001',
  UNTERMINATED_LOOP: 'T002',
  UNMATCHED_LOOP_END: 'T003',
  INVALID_SYNTAX: 'T004',
  UNKNOWN_KEY: 'T005',
  TYPE_MISMATCH: 'T006',
  TIMEOUT: 'T007',

  // Configuration errors (C001-C005)
  INVALID_CONFIG: 'C001',
  UNSUPPORTED_VALUE: 'C002',
  UNSUPPORTED_DATA_FILE: 'C003',
  INVALID_OVERRIDE: 'C004',
  UNKNOWN_TARGET: 'C005',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  WRITE_FAILED: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Template failure kinds, one per T-code. */
export type TemplateErrorKind =
  | 'UnterminatedPlaceholder'
  | 'UnterminatedLoop'
  | 'UnmatchedLoopEnd'
  | 'InvalidSyntax'
  | 'UnknownKey'
  | 'TypeMismatch'
  | 'Timeout';

const KIND_CODES: Record<TemplateErrorKind, ErrorCode> = {
  UnterminatedPlaceholder: ErrorCodes.UNTERMINATED_PLACEHOLDER,
  UnterminatedLoop: ErrorCodes.UNTERMINATED_LOOP,
  UnmatchedLoopEnd: ErrorCodes.UNMATCHED_LOOP_END,
  InvalidSyntax: ErrorCodes.INVALID_SYNTAX,
  UnknownKey: ErrorCodes.UNKNOWN_KEY,
  TypeMismatch: ErrorCodes.TYPE_MISMATCH,
  Timeout: ErrorCodes.TIMEOUT,
};

/**
 * Location of a token in template source.
 * `offset` counts UTF-16 code units from the start of the template;
 * `line` and `column` are 1-based.
 */
export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

/** Value kinds named in type-mismatch errors. */
export type ValueKindName =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'date'
  | 'list'
  | 'table'
  | 'scalar';

interface TemplateErrorInit {
  position?: SourcePosition;
  path?: string;
  expected?: ValueKindName;
  actual?: ValueKindName;
  maxSteps?: number;
}

/**
 * Tokenization or rendering failure. Terminal for the render call that
 * raised it; the engine never returns partial output alongside one.
 */
export class TemplateError extends DocstampError {
  readonly kind: TemplateErrorKind;
  readonly position?: SourcePosition;
  /** Dotted path for UnknownKey and TypeMismatch */
  readonly path?: string;
  readonly expected?: ValueKindName;
  readonly actual?: ValueKindName;

  constructor(kind: TemplateErrorKind, message: string, init: TemplateErrorInit = {}) {
    const details: Record<string, unknown> = { kind };
    for (const [key, value] of Object.entries(init)) {
      if (value !== undefined) details[key] = value;
    }
    super(KIND_CODES[kind], message, details);
    this.name = 'TemplateError';
    this.kind = kind;
    this.position = init.position;
    this.path = init.path;
    this.expected = init.expected;
    this.actual = init.actual;
  }

  static unterminatedPlaceholder(position: SourcePosition, escaped = false): TemplateError {
    const what = escaped ? 'Unclosed escaped placeholder' : 'Unclosed placeholder';
    return new TemplateError(
      'UnterminatedPlaceholder',
      `${what} at ${formatPosition(position)}: missing '}}'`,
      { position }
    );
  }

  static unterminatedLoop(path: string, position: SourcePosition): TemplateError {
    return new TemplateError(
      'UnterminatedLoop',
      `Unclosed each loop over '${path}' at ${formatPosition(position)}: missing {{/each}}`,
      { path, position }
    );
  }

  static unmatchedLoopEnd(position: SourcePosition): TemplateError {
    return new TemplateError(
      'UnmatchedLoopEnd',
      `Unexpected {{/each}} without matching {{each}} at ${formatPosition(position)}`,
      { position }
    );
  }

  static invalidSyntax(reason: string, position: SourcePosition): TemplateError {
    return new TemplateError(
      'InvalidSyntax',
      `Malformed syntax at ${formatPosition(position)}: ${reason}`,
      { position }
    );
  }

  static unknownKey(path: string, position?: SourcePosition): TemplateError {
    const where = position ? ` at ${formatPosition(position)}` : '';
    return new TemplateError('UnknownKey', `Undefined key '${path}'${where}`, { path, position });
  }

  static typeMismatch(
    path: string,
    expected: ValueKindName,
    actual: ValueKindName,
    position?: SourcePosition
  ): TemplateError {
    const where = position ? ` at ${formatPosition(position)}` : '';
    let hint = '';
    if (expected === 'scalar' && actual === 'list') {
      hint = `. Use {{each ${path} |item|}} ... {{/each}}`;
    } else if (expected === 'scalar' && actual === 'table') {
      hint = `. Use nested keys like ${path}.field`;
    }
    return new TemplateError(
      'TypeMismatch',
      `Expected ${expected} at '${path}'${where}, found ${actual}${hint}`,
      { path, expected, actual, position }
    );
  }

  static timeout(maxSteps: number, position?: SourcePosition): TemplateError {
    const where = position ? ` at ${formatPosition(position)}` : '';
    return new TemplateError(
      'Timeout',
      `Template rendering exceeded ${maxSteps} steps${where}. Check for runaway {{each}} nesting.`,
      { maxSteps, position }
    );
  }
}

/**
 * Format a source position as `line:column`.
 */
export function formatPosition(position: SourcePosition): string {
  return `${position.line}:${position.column}`;
}

/**
 * Narrow an unknown thrown value to a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
