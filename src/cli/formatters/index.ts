/**
 * Formatter barrel file and factory.
 */
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

/**
 * Create a formatter for the requested output format.
 */
export function createFormatter(options: Partial<FormatOptions> = {}): IFormatter {
  if (options.format === 'json') {
    return new JsonFormatter();
  }
  return new HumanFormatter(options);
}
