import { describe, test, expect, beforeEach, afterEach } from 'vitest';
/**
 * File utils 单元测试
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildOutputFilename, ensureDirExists, resolveOutputPath, writeNewFile } from '../../utils/fileutils';

describe('fileutils', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tagsweep-fileutils-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('buildOutputFilename should use the tweets prefix and UTC timestamp', () => {
    expect(buildOutputFilename(new Date('2024-01-01T09:30:05Z'), 'csv')).toBe('tweets_20240101_093005.csv');
  });

  test('resolveOutputPath should return an absolute path', () => {
    const resolved = resolveOutputPath('data', new Date('2024-01-01T09:30:05Z'), 'json');

    expect(path.isAbsolute(resolved)).toBe(true);
    expect(resolved).toBe(path.resolve('data', 'tweets_20240101_093005.json'));
  });

  test('ensureDirExists should create nested directories', async () => {
    const nested = path.join(tempDir, 'a', 'b');
    await ensureDirExists(nested);
    await ensureDirExists(nested);

    const stat = await fs.stat(nested);
    expect(stat.isDirectory()).toBe(true);
  });

  test('writeNewFile should refuse to overwrite', async () => {
    const file = path.join(tempDir, 'out.csv');
    await writeNewFile(file, 'first');

    await expect(writeNewFile(file, 'second')).rejects.toMatchObject({ code: 'EEXIST' });
    expect(await fs.readFile(file, 'utf-8')).toBe('first');
  });
});
