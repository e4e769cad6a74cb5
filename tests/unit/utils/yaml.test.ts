/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { formatZodError, loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes, SystemError } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const schema = z.object({
  name: z.string(),
  count: z.number().int().default(1),
});

describe('parseYaml', () => {
  it('should parse mappings and sequences', () => {
    expect(parseYaml('name: test\nitems:\n  - one\n  - two\n')).toEqual({ name: 'test', items: ['one', 'two'] });
  });

  it('should throw SystemError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
    expect(() => parseYaml('key: [unclosed')).toThrow('Failed to parse YAML: ');
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: x\n', schema)).toEqual({ name: 'x', count: 1 });
  });

  it('should throw ConfigError naming the failing path', () => {
    try {
      parseYamlWithSchema('name: 3\n', schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
        expect(error.message).toMatch(/^YAML validation failed: name: /);
      }
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: loaded\ncount: 4\n');

    await expect(loadYamlWithSchema('/cfg.yaml', schema)).resolves.toEqual({ name: 'loaded', count: 4 });
    expect(mockReadFile).toHaveBeenCalledWith('/cfg.yaml');
  });

  it('should report unreadable files', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/missing.yaml', schema)).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
      message: 'Failed to load YAML file: /missing.yaml',
    });
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('count: 2\n');

    await expect(loadYamlWithSchema('/cfg.yaml', schema)).rejects.toThrow('(file: /cfg.yaml)');
  });

  it('should add the file path to parse errors', async () => {
    mockReadFile.mockResolvedValue('key: [unclosed');

    await expect(loadYamlWithSchema('/cfg.yaml', schema)).rejects.toBeInstanceOf(SystemError);
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ a: z.object({ b: z.string() }) }).safeParse({ a: { b: 1 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toMatch(/^a\.b: /);
    }
  });
});
