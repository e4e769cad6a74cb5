/**
 * Path resolution against a value tree plus loop-binding overlay,
 * and canonical stringification of scalars.
 */
import { TemplateError } from '../../utils/errors.js';
import type { SourcePosition } from '../../utils/errors.js';
import { formatPath } from './path.js';
import type { DottedPath } from './types.js';
import { formatDate, kindOf } from './value.js';
import type { ListValue, ScalarValue, TableValue, Value } from './value.js';

/**
 * Loop bindings visible at a point in the template, innermost last.
 */
export interface Overlay {
  lookup(name: string): Value | undefined;
}

/** Overlay with no bindings, used outside loops. */
export const EMPTY_OVERLAY: Overlay = Object.freeze({
  lookup: (): Value | undefined => undefined,
});

/**
 * Resolve a dotted path.
 *
 * The first segment is looked up in the overlay first, so loop bindings
 * shadow root keys of the same name. Every further segment indexes a table.
 *
 * @throws TemplateError UnknownKey when a segment is absent or indexes a non-table
 */
export function resolvePath(
  path: DottedPath,
  root: TableValue,
  overlay: Overlay = EMPTY_OVERLAY,
  position?: SourcePosition
): Value {
  const [head, ...rest] = path;
  let current = overlay.lookup(head) ?? root.entries.get(head);
  if (current === undefined) {
    throw TemplateError.unknownKey(formatPath(path), position);
  }

  for (const segment of rest) {
    const next: Value | undefined = current.kind === 'table' ? current.entries.get(segment) : undefined;
    if (next === undefined) {
      throw TemplateError.unknownKey(formatPath(path), position);
    }
    current = next;
  }

  return current;
}

/**
 * Resolve a path that must end at a scalar (placeholder substitution).
 *
 * @throws TemplateError TypeMismatch when the value is a list or table
 */
export function resolveScalar(
  path: DottedPath,
  root: TableValue,
  overlay: Overlay = EMPTY_OVERLAY,
  position?: SourcePosition
): ScalarValue {
  const value = resolvePath(path, root, overlay, position);
  if (value.kind === 'list' || value.kind === 'table') {
    throw TemplateError.typeMismatch(formatPath(path), 'scalar', value.kind, position);
  }
  return value;
}

/**
 * Resolve a path that must end at a list (loop source).
 *
 * @throws TemplateError TypeMismatch when the value is not a list
 */
export function resolveList(
  path: DottedPath,
  root: TableValue,
  overlay: Overlay = EMPTY_OVERLAY,
  position?: SourcePosition
): ListValue {
  const value = resolvePath(path, root, overlay, position);
  if (value.kind !== 'list') {
    throw TemplateError.typeMismatch(formatPath(path), 'list', kindOf(value), position);
  }
  return value;
}

/**
 * Canonical text for a scalar. Independent of locale.
 */
export function stringifyScalar(value: ScalarValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'date':
      return formatDate(value);
  }
}

/**
 * Shortest round-trip decimal for a float, never in exponent notation.
 * Non-finite values use TOML spelling: `nan`, `inf`, `-inf`.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0';

  const text = String(value);
  const exponentAt = text.indexOf('e');
  if (exponentAt === -1) {
    return text;
  }

  const negative = text.startsWith('-');
  const mantissa = text.slice(negative ? 1 : 0, exponentAt);
  const exponent = Number(text.slice(exponentAt + 1));
  const [intPart, fracPart = ''] = mantissa.split('.');
  const digits = intPart + fracPart;
  // Position of the decimal point within `digits` after applying the exponent
  const point = intPart.length + exponent;

  let expanded: string;
  if (point <= 0) {
    expanded = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    expanded = digits + '0'.repeat(point - digits.length);
  } else {
    expanded = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${expanded}` : expanded;
}
