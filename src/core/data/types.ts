/**
 * Data loader type definitions.
 */
import type { DottedPath } from '../template/types.js';

/** Supported data file formats */
export type DataFormat = 'toml' | 'yaml' | 'json';

/** Parsed top-level data table, before conversion to a value tree */
export type DataRecord = Record<string, unknown>;

/**
 * A `--set path=value` override.
 */
export interface DataOverride {
  path: DottedPath;
  value: string;
}
