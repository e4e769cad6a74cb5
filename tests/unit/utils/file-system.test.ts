/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  copyFile,
  ensureDir,
  fileExists,
  globFiles,
  isDirectory,
  makeTempDir,
  readFile,
  removeDir,
  replaceDir,
  writeFile,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'fs-utils-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should write files and create parent directories', async () => {
    const file = path.join(tempDir, 'a', 'b', 'c.txt');

    await writeFile(file, 'content');

    await expect(readFile(file)).resolves.toBe('content');
  });

  it('should copy bytes unchanged into new parent directories', async () => {
    const source = path.join(tempDir, 'logo.bin');
    const target = path.join(tempDir, 'out', 'img', 'logo.bin');
    await fs.promises.writeFile(source, Buffer.from([0, 255, 10, 13]));

    await copyFile(source, target);

    expect([...(await fs.promises.readFile(target))]).toEqual([0, 255, 10, 13]);
  });

  it('should check existence and directories', async () => {
    const file = path.join(tempDir, 'f.txt');
    await writeFile(file, 'x');

    expect(await fileExists(file)).toBe(true);
    expect(await fileExists(path.join(tempDir, 'nope'))).toBe(false);
    expect(await isDirectory(tempDir)).toBe(true);
    expect(await isDirectory(file)).toBe(false);
    expect(await isDirectory(path.join(tempDir, 'nope'))).toBe(false);
  });

  it('should create and remove directories', async () => {
    const dir = path.join(tempDir, 'x', 'y');

    await ensureDir(dir);
    expect(await isDirectory(dir)).toBe(true);

    await removeDir(path.join(tempDir, 'x'));
    expect(await fileExists(dir)).toBe(false);
    await expect(removeDir(path.join(tempDir, 'x'))).resolves.toBeUndefined();
  });

  it('should create unique temp directories inside a parent', async () => {
    const first = await makeTempDir('.stage-', tempDir);
    const second = await makeTempDir('.stage-', tempDir);

    expect(first).not.toBe(second);
    expect(path.dirname(first)).toBe(tempDir);
    expect(path.basename(first).startsWith('.stage-')).toBe(true);
  });

  it('should replace a directory with another', async () => {
    const target = path.join(tempDir, 'out');
    await writeFile(path.join(target, 'old.txt'), 'old');
    const staged = path.join(tempDir, 'staged');
    await writeFile(path.join(staged, 'new.txt'), 'new');

    await replaceDir(staged, target);

    expect(await fileExists(path.join(target, 'old.txt'))).toBe(false);
    await expect(readFile(path.join(target, 'new.txt'))).resolves.toBe('new');
    expect(await fileExists(staged)).toBe(false);
  });

  it('should glob files relative to a directory', async () => {
    await writeFile(path.join(tempDir, 'a.tmp.typ'), '');
    await writeFile(path.join(tempDir, 'sub', 'b.tmp.typ'), '');
    await writeFile(path.join(tempDir, 'c.typ'), '');

    const files = await globFiles('**/*.tmp.*', { cwd: tempDir, absolute: false });

    expect(files.sort()).toEqual(['a.tmp.typ', 'sub/b.tmp.typ']);
  });
});
