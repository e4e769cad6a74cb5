/**
 * Builds template contexts from TOML, YAML and JSON data files.
 */
import * as path from 'node:path';
import { parse as parseToml, TomlDate } from 'smol-toml';
import { ConfigError, SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { parseYaml } from '../../utils/yaml.js';
import { TemplateContext } from '../template/context.js';
import { parsePath } from '../template/path.js';
import type { DataFormat, DataRecord, DataOverride } from './types.js';

const EXTENSION_FORMATS: Record<string, DataFormat> = {
  '.toml': 'toml',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.json': 'json',
};

/**
 * Data format from a file extension.
 */
export function detectDataFormat(filePath: string): DataFormat {
  const format = EXTENSION_FORMATS[path.extname(filePath).toLowerCase()];
  if (!format) {
    throw new ConfigError(
      ErrorCodes.UNSUPPORTED_DATA_FILE,
      `Unsupported data file: ${filePath}. Expected .toml, .yaml, .yml or .json`,
      { filePath }
    );
  }
  return format;
}

/**
 * Parse data file content. The top level must be a table; an empty
 * YAML document counts as an empty table.
 */
export function parseDataContent(content: string, format: DataFormat, source: string = '<inline>'): DataRecord {
  let parsed: unknown;
  switch (format) {
    case 'toml':
      try {
        parsed = normalizeToml(parseToml(content, { integersAsBigInt: 'asNeeded' }));
      } catch (error) {
        throw new SystemError(ErrorCodes.PARSE_ERROR, `Failed to parse TOML: ${errorMessage(error)}`, { source });
      }
      break;
    case 'yaml':
      parsed = parseYaml(content) ?? {};
      break;
    case 'json':
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new SystemError(ErrorCodes.PARSE_ERROR, `Failed to parse JSON: ${errorMessage(error)}`, { source });
      }
      break;
  }

  if (!isDataRecord(parsed)) {
    throw new ConfigError(
      ErrorCodes.UNSUPPORTED_VALUE,
      `Data in ${source} must be a table at the top level`,
      { source }
    );
  }
  return parsed;
}

/**
 * Load one data file.
 */
export async function loadDataFile(filePath: string): Promise<DataRecord> {
  const format = detectDataFormat(filePath);
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_NOT_FOUND,
      `Failed to read data file: ${filePath}`,
      { filePath, error: errorMessage(error) }
    );
  }

  try {
    return parseDataContent(content, format, filePath);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    throw error;
  }
}

/**
 * Merge data records left to right. A later top-level key replaces an
 * earlier one whole; nested tables are not merged.
 */
export function mergeData(records: readonly DataRecord[]): DataRecord {
  const merged: DataRecord = {};
  for (const record of records) {
    for (const [key, value] of Object.entries(record)) {
      defineEntry(merged, key, value);
    }
  }
  return merged;
}

/**
 * Parse a `path=value` override. The value is kept as a string.
 */
export function parseOverride(text: string): DataOverride {
  const eq = text.indexOf('=');
  const pathText = eq === -1 ? '' : text.slice(0, eq).trim();
  const segments = parsePath(pathText);
  if (!segments) {
    throw new ConfigError(
      ErrorCodes.INVALID_OVERRIDE,
      `Invalid override '${text}'. Expected <dotted.key>=<value>`,
      { override: text }
    );
  }
  return { path: segments, value: text.slice(eq + 1) };
}

/**
 * Return a copy of `data` with each override applied, creating
 * intermediate tables as needed.
 */
export function applyOverrides(data: DataRecord, overrides: readonly DataOverride[]): DataRecord {
  let result = data;
  for (const override of overrides) {
    result = setDataPath(result, override.path, override.value, override.path.join('.'));
  }
  return result;
}

/**
 * Load, merge and override data files into a template context.
 */
export async function loadDataContext(
  files: readonly string[],
  overrides: readonly DataOverride[] = []
): Promise<TemplateContext> {
  const records: DataRecord[] = [];
  for (const file of files) {
    logger.debug(`Loading data file ${file}`);
    records.push(await loadDataFile(file));
  }
  return TemplateContext.fromData(applyOverrides(mergeData(records), overrides));
}

function setDataPath(data: DataRecord, segments: readonly string[], value: string, fullPath: string): DataRecord {
  const [head, ...rest] = segments;
  const copy = mergeData([data]);
  if (rest.length === 0) {
    defineEntry(copy, head, value);
    return copy;
  }

  const existing = Object.prototype.hasOwnProperty.call(data, head) ? data[head] : undefined;
  if (existing !== undefined && !isDataRecord(existing)) {
    throw new ConfigError(
      ErrorCodes.INVALID_OVERRIDE,
      `Cannot set '${fullPath}': '${head}' is not a table`,
      { path: fullPath }
    );
  }
  defineEntry(copy, head, setDataPath(existing ?? {}, rest, value, fullPath));
  return copy;
}

/**
 * Replace TOML dates with values the template layer understands. A local
 * date becomes a `Date` at UTC midnight of the day as written; date-times
 * and times become their text, with zero milliseconds dropped.
 */
function normalizeToml(value: unknown): unknown {
  if (value instanceof TomlDate) {
    const text = value.toISOString();
    if (value.isDate()) return new Date(`${text}T00:00:00Z`);
    return text.replace(/\.000(?=$|[Z+-])/, '');
  }
  if (Array.isArray(value)) return value.map(normalizeToml);
  if (isDataRecord(value)) {
    const result: DataRecord = {};
    for (const [key, entry] of Object.entries(value)) {
      defineEntry(result, key, normalizeToml(entry));
    }
    return result;
  }
  return value;
}

/** Own-property write that is safe for keys such as `__proto__`. */
function defineEntry(target: DataRecord, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function isDataRecord(value: unknown): value is DataRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
