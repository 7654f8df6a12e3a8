/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile, fileExists, ensureDir } from '../../../src/utils/file-system.js';
import { mkdirSync, writeFileSync, rmSync, existsSync, statSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `calc-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file contents', async () => {
      const filePath = join(tempDir, 'test.txt');
      writeFileSync(filePath, 'hello');

      expect(await readFile(filePath)).toBe('hello');
    });

    it('should throw for non-existent file', async () => {
      await expect(readFile(join(tempDir, 'missing.txt'))).rejects.toThrow();
    });
  });

  describe('writeFile', () => {
    it('should create parent directories if needed', async () => {
      const filePath = join(tempDir, 'nested', 'dir', 'config.yaml');

      await writeFile(filePath, 'version: "1.0"\n');

      expect(await readFile(filePath)).toBe('version: "1.0"\n');
    });
  });

  describe('fileExists', () => {
    it('should return true for existing file', async () => {
      const filePath = join(tempDir, 'exists.txt');
      writeFileSync(filePath, '');

      expect(await fileExists(filePath)).toBe(true);
    });

    it('should return false for non-existent file', async () => {
      expect(await fileExists(join(tempDir, 'nope.txt'))).toBe(false);
    });
  });

  describe('ensureDir', () => {
    it('should create nested directories', async () => {
      const dirPath = join(tempDir, 'a', 'b');

      await ensureDir(dirPath);

      expect(existsSync(dirPath)).toBe(true);
      expect(statSync(dirPath).isDirectory()).toBe(true);
    });

    it('should not throw for existing directory', async () => {
      await expect(ensureDir(tempDir)).resolves.toBeUndefined();
    });
  });
});
