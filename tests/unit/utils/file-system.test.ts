/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { readFile, fileExists, isDirectory, globFiles } from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ecoaudit-fs-'));
    await fs.mkdir(path.join(tempDir, 'beta'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'alpha', 'nested'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'node_modules', 'pkg'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'beta', 'metadata.yml'), 'status: stable\n');
    await fs.writeFile(path.join(tempDir, 'alpha', 'metadata.yaml'), 'status: beta\n');
    await fs.writeFile(path.join(tempDir, 'alpha', 'nested', 'metadata.yml'), '');
    await fs.writeFile(path.join(tempDir, 'node_modules', 'pkg', 'metadata.yml'), '');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file contents as UTF-8', async () => {
      expect(await readFile(path.join(tempDir, 'beta', 'metadata.yml'))).toBe('status: stable\n');
    });
  });

  describe('fileExists', () => {
    it('should report existing and missing paths', async () => {
      expect(await fileExists(path.join(tempDir, 'beta', 'metadata.yml'))).toBe(true);
      expect(await fileExists(path.join(tempDir, 'missing.yml'))).toBe(false);
    });
  });

  describe('isDirectory', () => {
    it('should distinguish directories from files', async () => {
      expect(await isDirectory(path.join(tempDir, 'alpha'))).toBe(true);
      expect(await isDirectory(path.join(tempDir, 'beta', 'metadata.yml'))).toBe(false);
      expect(await isDirectory(path.join(tempDir, 'missing'))).toBe(false);
    });
  });

  describe('globFiles', () => {
    it('should return sorted matches and skip node_modules', async () => {
      const files = await globFiles('**/metadata.{yml,yaml}', { cwd: tempDir });

      expect(files).toEqual(['alpha/metadata.yaml', 'alpha/nested/metadata.yml', 'beta/metadata.yml']);
    });

    it('should honour the depth limit', async () => {
      const files = await globFiles('*/metadata.{yml,yaml}', { cwd: tempDir, deep: 2 });

      expect(files).toEqual(['alpha/metadata.yaml', 'beta/metadata.yml']);
    });
  });
});
