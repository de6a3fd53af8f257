/**
 * @arch lintcache.test.unit
 */
/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  readFile,
  writeFileAtomic,
  fileExists,
  removeFile,
  ensureDir,
} from '../../../src/utils/file-system.js';
import { mkdirSync, writeFileSync, rmSync, existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `lintcache-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read a file as UTF-8', async () => {
    const filePath = join(tempDir, 'test.txt');
    writeFileSync(filePath, 'Grüße');

    expect(await readFile(filePath)).toBe('Grüße');
  });

  it('should create parent directories when writing atomically', async () => {
    const filePath = join(tempDir, 'a', 'b', 'out.txt');

    await writeFileAtomic(filePath, 'content');

    expect(readFileSync(filePath, 'utf-8')).toBe('content');
  });

  describe('writeFileAtomic', () => {
    it('should replace existing content and leave no temporary file', async () => {
      const filePath = join(tempDir, 'cache.json');
      writeFileSync(filePath, 'old');

      await writeFileAtomic(filePath, 'new');

      expect(readFileSync(filePath, 'utf-8')).toBe('new');
      expect(readdirSync(tempDir)).toEqual(['cache.json']);
    });

    it('should reject and clean up when the rename fails', async () => {
      const target = join(tempDir, 'target');
      mkdirSync(join(target, 'occupied'), { recursive: true });

      await expect(writeFileAtomic(target, 'data')).rejects.toThrow();

      expect(readdirSync(tempDir)).toEqual(['target']);
    });

    it('should handle concurrent writes to the same file', async () => {
      const filePath = join(tempDir, 'cache.json');

      await Promise.all([
        writeFileAtomic(filePath, 'first'),
        writeFileAtomic(filePath, 'second'),
      ]);

      expect(['first', 'second']).toContain(readFileSync(filePath, 'utf-8'));
      expect(readdirSync(tempDir)).toEqual(['cache.json']);
    });
  });

  describe('fileExists / removeFile', () => {
    it('should report existing files', async () => {
      const filePath = join(tempDir, 'exists.txt');
      writeFileSync(filePath, '');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(join(tempDir, 'missing.txt'))).toBe(false);
    });

    it('should remove a file and ignore a missing one', async () => {
      const filePath = join(tempDir, 'gone.txt');
      writeFileSync(filePath, '');

      await removeFile(filePath);
      await removeFile(filePath);

      expect(existsSync(filePath)).toBe(false);
    });
  });

  it('should create nested directories', async () => {
    const dir = join(tempDir, 'x', 'y');

    await ensureDir(dir);
    await ensureDir(dir);

    expect(existsSync(dir)).toBe(true);
  });
});
