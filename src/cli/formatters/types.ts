/**
 * Formatter type definitions.
 */
import type { GenerateSummary } from '../../core/generate/types.js';
import type { TemplateOutline } from '../../core/template/engine.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Verbose output */
  verbose: boolean;
}

/**
 * Outcome of checking one template file.
 */
export interface CheckReport {
  file: string;
  /** Present when the template tokenized */
  outline?: TemplateOutline;
  /** Present when the template failed to tokenize or could not be read */
  error?: unknown;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatCheck(reports: readonly CheckReport[]): string;
  formatGenerate(summary: GenerateSummary, dryRun: boolean): string;
  formatError(error: unknown, file?: string): string;
}
