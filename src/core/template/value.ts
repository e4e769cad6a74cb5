/**
 * Tagged-variant value tree used as substitution data.
 *
 * Values are frozen on construction. Tables use a Map so that keys such as
 * `constructor` or `__proto__` never collide with object prototype members.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { ValueKindName } from '../../utils/errors.js';

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: bigint;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/** Calendar date; month and day are 1-based. */
export interface DateValue {
  readonly kind: 'date';
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

export interface TableValue {
  readonly kind: 'table';
  readonly entries: ReadonlyMap<string, Value>;
}

export type ScalarValue = StringValue | IntegerValue | FloatValue | BooleanValue | DateValue;

export type Value = ScalarValue | ListValue | TableValue;

export type ValueKind = Value['kind'];

export function str(value: string): StringValue {
  return Object.freeze({ kind: 'string', value });
}

/**
 * Integer value. A number argument must be a safe integer.
 */
export function int(value: bigint | number): IntegerValue {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`Not a safe integer: ${value}`);
  }
  return Object.freeze({ kind: 'integer', value: BigInt(value) });
}

export function float(value: number): FloatValue {
  return Object.freeze({ kind: 'float', value });
}

export function bool(value: boolean): BooleanValue {
  return Object.freeze({ kind: 'boolean', value });
}

export function date(year: number, month: number, day: number): DateValue {
  if (!isValidCalendarDate(year, month, day)) {
    throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
  }
  return Object.freeze({ kind: 'date', year, month, day });
}

export function list(items: readonly Value[]): ListValue {
  return Object.freeze({ kind: 'list', items: Object.freeze([...items]) });
}

export function table(record: Record<string, Value>): TableValue {
  return tableFromEntries(Object.entries(record));
}

/**
 * Table from key/value pairs. A repeated key keeps its last value.
 */
export function tableFromEntries(entries: Iterable<readonly [string, Value]>): TableValue {
  return Object.freeze({ kind: 'table', entries: new FrozenMap(entries) });
}

export function isScalar(value: Value): value is ScalarValue {
  return value.kind !== 'list' && value.kind !== 'table';
}

export function isTable(value: Value): value is TableValue {
  return value.kind === 'table';
}

export function isList(value: Value): value is ListValue {
  return value.kind === 'list';
}

/** Kind name as reported in type-mismatch errors. */
export function kindOf(value: Value): ValueKindName {
  return value.kind;
}

/**
 * Convert parsed data (TOML, YAML or JSON output) into a value tree.
 *
 * - strings, booleans, bigints map directly
 * - integral numbers become integers, other numbers floats
 * - Date instances become calendar dates from their UTC fields
 * - arrays become lists, plain objects and Maps become tables
 *
 * Anything else (null, undefined, functions, symbols, class instances)
 * raises ConfigError naming the offending data path.
 */
export function fromPlain(data: unknown, path: string = ''): Value {
  if (typeof data === 'string') return str(data);
  if (typeof data === 'boolean') return bool(data);
  if (typeof data === 'bigint') return int(data);
  if (typeof data === 'number') {
    return Number.isSafeInteger(data) ? int(data) : float(data);
  }
  if (data instanceof Date) {
    if (Number.isNaN(data.getTime())) {
      throw unsupported(path, 'invalid date');
    }
    return date(data.getUTCFullYear(), data.getUTCMonth() + 1, data.getUTCDate());
  }
  if (Array.isArray(data)) {
    return list(data.map((item, i) => fromPlain(item, `${path}[${i}]`)));
  }
  if (data instanceof Map) {
    const entries: Array<[string, Value]> = [];
    for (const [key, value] of data) {
      const name = String(key);
      entries.push([name, fromPlain(value, joinDataPath(path, name))]);
    }
    return tableFromEntries(entries);
  }
  if (isPlainObject(data)) {
    return tableFromEntries(
      Object.entries(data).map(([key, value]) => [key, fromPlain(value, joinDataPath(path, key))] as const)
    );
  }
  throw unsupported(path, data === null ? 'null' : typeof data);
}

/**
 * Convert a value tree back into plain data. Integers outside the safe
 * range stay bigints; dates become `YYYY-MM-DD` strings.
 */
export function toPlain(value: Value): unknown {
  switch (value.kind) {
    case 'string':
    case 'float':
    case 'boolean':
      return value.value;
    case 'integer': {
      const asNumber = Number(value.value);
      return Number.isSafeInteger(asNumber) ? asNumber : value.value;
    }
    case 'date':
      return formatDate(value);
    case 'list':
      return value.items.map(toPlain);
    case 'table': {
      const result: Record<string, unknown> = {};
      for (const [key, item] of value.entries) {
        Object.defineProperty(result, key, { value: toPlain(item), enumerable: true, writable: true, configurable: true });
      }
      return result;
    }
  }
}

/** ISO-8601 calendar date, `YYYY-MM-DD`. Years beyond 9999 keep all digits. */
export function formatDate(value: DateValue): string {
  const year = value.year < 0
    ? `-${String(-value.year).padStart(4, '0')}`
    : String(value.year).padStart(4, '0');
  return `${year}-${pad2(value.month)}-${pad2(value.day)}`;
}

/**
 * Read-only Map. `set`, `delete` and `clear` throw so that a table
 * handed to the engine cannot be altered through a cast.
 */
class FrozenMap<K, V> extends Map<K, V> {
  private sealed = false;

  constructor(entries: Iterable<readonly [K, V]>) {
    super();
    for (const [key, value] of entries) {
      super.set(key, value);
    }
    this.sealed = true;
  }

  override set(key: K, value: V): this {
    if (this.sealed) {
      throw new TypeError('Table values are immutable');
    }
    return super.set(key, value);
  }

  override delete(): boolean {
    throw new TypeError('Table values are immutable');
  }

  override clear(): void {
    throw new TypeError('Table values are immutable');
  }
}

function unsupported(path: string, what: string): ConfigError {
  const where = path === '' ? 'data root' : `'${path}'`;
  return new ConfigError(
    ErrorCodes.UNSUPPORTED_VALUE,
    `Unsupported value at ${where}: ${what}`,
    { path, type: what }
  );
}

function joinDataPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

function isPlainObject(data: unknown): data is Record<string, unknown> {
  if (typeof data !== 'object' || data === null) return false;
  const proto: unknown = Object.getPrototypeOf(data);
  return proto === Object.prototype || proto === null;
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (month < 1 || month > 12 || day < 1) return false;
  const probe = new Date(Date.UTC(2000, month - 1, day));
  probe.setUTCFullYear(year);
  return probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}
