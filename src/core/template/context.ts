/**
 * Template context: the immutable root table a template renders against.
 */
import { TemplateError } from '../../utils/errors.js';
import { parsePath } from './path.js';
import { resolvePath } from './resolver.js';
import { fromPlain, kindOf } from './value.js';
import type { TableValue, Value } from './value.js';

export class TemplateContext {
  readonly root: TableValue;

  constructor(root: TableValue) {
    this.root = root;
  }

  /**
   * Build a context from parsed data (TOML, YAML, JSON or a plain object).
   *
   * @throws TemplateError TypeMismatch when the data is not a table
   * @throws ConfigError when the data holds a value with no Value counterpart
   */
  static fromData(data: unknown): TemplateContext {
    return TemplateContext.fromValue(fromPlain(data));
  }

  /**
   * @throws TemplateError TypeMismatch when `value` is not a table
   */
  static fromValue(value: Value): TemplateContext {
    if (value.kind !== 'table') {
      throw TemplateError.typeMismatch('<root>', 'table', kindOf(value));
    }
    return new TemplateContext(value);
  }

  /**
   * Look up a dotted path such as `paper.title`, outside any loop.
   */
  get(path: string): Value {
    const segments = parsePath(path);
    if (!segments) {
      throw TemplateError.unknownKey(path);
    }
    return resolvePath(segments, this.root);
  }

  has(path: string): boolean {
    try {
      this.get(path);
      return true;
    } catch (error) {
      if (error instanceof TemplateError) return false;
      throw error;
    }
  }
}
