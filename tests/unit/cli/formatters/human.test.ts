/**
 * Tests for the human-readable formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { createFormatter, JsonFormatter } from '../../../../src/cli/formatters/index.js';
import type { GenerateSummary } from '../../../../src/core/generate/types.js';
import { compile } from '../../../../src/core/template/engine.js';
import { ConfigError, TemplateError } from '../../../../src/utils/errors.js';

const outline = compile('{{title}} {{each authors |a|}}{{a.name}}{{/each}} \\{{x}}').outline();
const tokenizeError = TemplateError.unterminatedPlaceholder({ offset: 12, line: 2, column: 4 });

const summary: GenerateSummary = {
  results: [
    {
      target: 'paper',
      success: true,
      outputDir: '/p/paper/_generated',
      files: [{ template: 'meta.tmp.typ', output: 'meta.typ', length: 10 }],
      copied: [],
    },
    {
      target: 'slides',
      success: false,
      outputDir: '/p/slides/_generated',
      files: [],
      copied: [],
      template: 'deck.tmp.typ',
      error: "deck.tmp.typ: Undefined key 'x' at 1:1",
      errorCode: 'T005',
    },
  ],
  generated: ['paper'],
  failed: ['slides'],
};

describe('HumanFormatter', () => {
  const formatter = new HumanFormatter({ colors: false });

  describe('formatCheck', () => {
    it('should summarize a passing template', () => {
      expect(formatter.formatCheck([{ file: 'meta.tmp.typ', outline }])).toBe(
        '✓ meta.tmp.typ: 2 placeholders, 1 loop, 1 escaped tag'
      );
    });

    it('should list keys when verbose', () => {
      const verbose = new HumanFormatter({ colors: false, verbose: true });

      expect(verbose.formatCheck([{ file: 'a.typ', outline }]).split('\n')).toEqual([
        '✓ a.typ: 2 placeholders, 1 loop, 1 escaped tag',
        '   key  title',
        '   key  a.name',
        '   each authors',
      ]);
    });

    it('should locate failures and count results', () => {
      const output = formatter.formatCheck([
        { file: 'a.typ', outline },
        { file: 'b.typ', error: tokenizeError },
      ]);

      expect(output.split('\n')).toEqual([
        '✓ a.typ: 2 placeholders, 1 loop, 1 escaped tag',
        "✗ b.typ:2:4 T001 Unclosed placeholder at 2:4: missing '}}'",
        '',
        '1 passed, 1 failed',
      ]);
    });
  });

  describe('formatGenerate', () => {
    it('should list each target and a total', () => {
      expect(formatter.formatGenerate(summary, false).split('\n')).toEqual([
        '✓ paper → /p/paper/_generated (1 file)',
        "✗ slides: T005 deck.tmp.typ: Undefined key 'x' at 1:1",
        '',
        '1 generated, 1 failed',
      ]);
    });

    it('should add a dry-run header and file lists when verbose', () => {
      const verbose = new HumanFormatter({ colors: false, verbose: true });
      const lines = verbose.formatGenerate({ ...summary, results: [summary.results[0]], failed: [] }, true).split('\n');

      expect(lines).toEqual([
        'Dry Run - Would generate:',
        '',
        '✓ paper → /p/paper/_generated (1 file)',
        '   meta.tmp.typ → meta.typ',
        '',
        '1 generated, 0 failed',
      ]);
    });

    it('should count and list copied static files', () => {
      const verbose = new HumanFormatter({ colors: false, verbose: true });
      const withStatic = { ...summary.results[0], copied: ['header.typ'] };
      const lines = verbose.formatGenerate({ results: [withStatic], generated: ['paper'], failed: [] }, false).split('\n');

      expect(lines).toEqual([
        '✓ paper → /p/paper/_generated (1 file, 1 copied)',
        '   meta.tmp.typ → meta.typ',
        '   header.typ (copied)',
        '',
        '1 generated, 0 failed',
      ]);
    });

    it('should report an empty configuration', () => {
      expect(formatter.formatGenerate({ results: [], generated: [], failed: [] }, false)).toBe('No targets configured');
    });
  });

  describe('formatError', () => {
    it('should print code and message', () => {
      expect(formatter.formatError(new ConfigError('C005', "Unknown target 'x'"))).toBe("C005 Unknown target 'x'");
    });

    it('should prefix the file for unpositioned errors', () => {
      expect(formatter.formatError(TemplateError.unknownKey('k'), 'a.typ')).toBe("a.typ: T005 Undefined key 'k'");
    });

    it('should handle plain errors', () => {
      expect(formatter.formatError(new Error('boom'), 'a.typ')).toBe('a.typ: boom');
      expect(formatter.formatError('boom')).toBe('Unknown error');
    });
  });
});

describe('createFormatter', () => {
  it('should pick the formatter by format', () => {
    expect(createFormatter({ format: 'json' })).toBeInstanceOf(JsonFormatter);
    expect(createFormatter({ format: 'human' })).toBeInstanceOf(HumanFormatter);
    expect(createFormatter()).toBeInstanceOf(HumanFormatter);
  });
});
