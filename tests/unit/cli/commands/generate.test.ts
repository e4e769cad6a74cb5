/**
 * Tests for the generate command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createGenerateCommand } from '../../../../src/cli/commands/generate.js';

vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
    bold: (s: string) => s,
  },
}));

vi.mock('../../../../src/utils/logger.js', () => {
  const mockLogger = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  mockLogger.child.mockReturnValue(mockLogger);
  return { logger: mockLogger };
});

import { logger as log } from '../../../../src/utils/logger.js';

const CONFIG = `targets:
  - name: paper
    source: paper
    data: paper/data.yaml
`;

describe('generate command', () => {
  let root: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.mocked(log.child).mockReturnValue(log);
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'generate-cmd-'));
    await write('.docstamp/config.yaml', CONFIG);
    await write('paper/meta.tmp.typ', '= {{title}}');
    await write('paper/data.yaml', 'title: Stamps\n');
    vi.spyOn(process, 'cwd').mockReturnValue(root);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((): never => {
      throw new Error('process.exit called');
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  async function write(relative: string, content: string): Promise<void> {
    const file = path.join(root, relative);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, content, 'utf-8');
  }

  async function run(args: string[]): Promise<void> {
    await createGenerateCommand().parseAsync(args, { from: 'user' });
  }

  function printed(): string {
    return vi.mocked(console.log).mock.calls.map((call) => String(call[0])).join('\n');
  }

  it('should generate every configured target', async () => {
    await run([]);

    const outputDir = path.join(root, 'paper', '_generated');
    expect(printed().split('\n')).toEqual([`✓ paper → ${outputDir} (1 file)`, '', '1 generated, 0 failed']);
    expect(await fs.promises.readFile(path.join(outputDir, 'meta.typ'), 'utf-8')).toBe('= Stamps');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should write nothing on --dry-run', async () => {
    await run(['--dry-run']);

    expect(printed().split('\n')[0]).toBe('Dry Run - Would generate:');
    expect(fs.existsSync(path.join(root, 'paper', '_generated'))).toBe(false);
  });

  it('should exit 1 when a target fails', async () => {
    await write('paper/meta.tmp.typ', '= {{subtitle}}');

    await expect(run([])).rejects.toThrow('process.exit called');

    expect(printed().split('\n')).toEqual([
      "✗ paper: T005 meta.tmp.typ: Undefined key 'subtitle' at 1:3",
      '',
      '0 generated, 1 failed',
    ]);
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should reject unknown targets', async () => {
    await expect(run(['poster'])).rejects.toThrow('process.exit called');

    expect(log.error).toHaveBeenCalledWith("Unknown target 'poster'. Configured targets: paper");
    expect(console.log).not.toHaveBeenCalled();
  });

  it('should read an explicit config file', async () => {
    await write('alt.yaml', `${CONFIG}    output: out/paper\n`);

    await run(['-c', 'alt.yaml', '--json']);

    expect(JSON.parse(printed())).toMatchObject({
      dry_run: false,
      generated: ['paper'],
      targets: [{ target: 'paper', status: 'pass', output_dir: path.join(root, 'out', 'paper') }],
    });
  });

  it('should report a missing explicit config file', async () => {
    await expect(run(['-c', 'nope.yaml'])).rejects.toThrow('process.exit called');

    expect(log.error).toHaveBeenCalledWith(`Config file not found: ${path.join(root, 'nope.yaml')}`);
  });
});
