/**
 * Tests for TemplateContext.
 */
import { describe, it, expect } from 'vitest';
import { TemplateContext } from '../../../../src/core/template/context.js';
import { int, list, str, table } from '../../../../src/core/template/value.js';
import { ConfigError, TemplateError } from '../../../../src/utils/errors.js';

describe('TemplateContext', () => {
  const context = TemplateContext.fromData({ paper: { title: 'T', year: 2024 } });

  it('should look up dotted paths', () => {
    expect(context.get('paper.title')).toEqual(str('T'));
    expect(context.get('paper.year')).toEqual(int(2024));
  });

  it('should report whether a path resolves', () => {
    expect(context.has('paper.title')).toBe(true);
    expect(context.has('paper.venue')).toBe(false);
    expect(context.has('not a path')).toBe(false);
  });

  it('should throw UnknownKey for malformed paths', () => {
    expect(() => context.get('a..b')).toThrow(TemplateError);
    expect(() => context.get('a..b')).toThrow("Undefined key 'a..b'");
  });

  it('should require a table at the root', () => {
    expect(() => TemplateContext.fromValue(list([]))).toThrow("Expected table at '<root>', found list");
    expect(() => TemplateContext.fromData('text')).toThrow(TemplateError);
  });

  it('should accept a prebuilt table', () => {
    const root = table({ a: str('x') });

    expect(TemplateContext.fromValue(root).root).toBe(root);
  });

  it('should reject data with no value counterpart', () => {
    expect(() => TemplateContext.fromData({ a: null })).toThrow(ConfigError);
  });
});
