import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fc from 'fast-check';
import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  validatePath,
  resolveWithin,
  safeReadFile,
  safeWriteFile,
  safeAppendFile,
  safeMkdir,
  safeReaddir,
  safeUnlink,
  safeRename,
  isErrnoCode,
  PathValidationError,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'safe-fs-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should return absolute paths unchanged', () => {
      expect(validatePath('/tmp/test.txt')).toBe('/tmp/test.txt');
    });

    it('should resolve relative paths to absolute', () => {
      expect(path.isAbsolute(validatePath('./test.txt'))).toBe(true);
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('/tmp/a\0b')).toThrow(PathValidationError);
    });

    it('should always produce an absolute path for non-empty input without null bytes', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (p) => {
            expect(path.isAbsolute(validatePath(p))).toBe(true);
          }
        )
      );
    });
  });

  describe('resolveWithin', () => {
    it('should join a plain file name onto the base directory', () => {
      expect(resolveWithin('/tmp/sessions', 'abc.json')).toBe('/tmp/sessions/abc.json');
    });

    it.each(['', '.', '..', '../escape.json', 'nested/file.json', 'back\\slash'])(
      'should reject %j',
      (name) => {
        expect(() => resolveWithin('/tmp/sessions', name)).toThrow(PathValidationError);
      }
    );
  });

  describe('file operations', () => {
    it('should write, append, read and list files', async () => {
      const dir = join(tempDir, 'nested', 'dir');
      await safeMkdir(dir);
      const file = join(dir, 'data.txt');

      await safeWriteFile(file, 'hello');
      await safeAppendFile(file, ' world');

      expect(await safeReadFile(file)).toBe('hello world');
      expect(await safeReaddir(dir)).toEqual(['data.txt']);
    });

    it('should rename and unlink files', async () => {
      const from = join(tempDir, 'from.txt');
      const to = join(tempDir, 'to.txt');
      await safeWriteFile(from, 'content');

      await safeRename(from, to);
      expect(await readFile(to, 'utf-8')).toBe('content');

      await safeUnlink(to);
      await expect(safeReadFile(to)).rejects.toThrow();
    });

    it('should surface ENOENT for missing files', async () => {
      let caught: unknown;
      try {
        await safeReadFile(join(tempDir, 'missing.txt'));
      } catch (error) {
        caught = error;
      }
      expect(isErrnoCode(caught, 'ENOENT')).toBe(true);
      expect(isErrnoCode(caught, 'EACCES')).toBe(false);
    });
  });

  describe('isErrnoCode', () => {
    it('should return false for non-errors', () => {
      expect(isErrnoCode('ENOENT', 'ENOENT')).toBe(false);
      expect(isErrnoCode(new Error('plain'), 'ENOENT')).toBe(false);
    });
  });
});
