/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat, writeFile as fsWriteFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  readFile,
  readHead,
  writeFile,
  copyFile,
  fileExists,
  isDirectory,
  isFile,
  ensureDir,
  removePath,
  listSubdirectories,
  isEmptyDirectory,
  globFiles,
  makeExecutable,
  isWithin,
  toPosixPath,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'stampkit-fs-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('writeFile / readFile', () => {
    it('should create parent directories', async () => {
      const filePath = join(tempDir, 'a', 'b', 'c.txt');

      await writeFile(filePath, 'hello');

      expect(await readFile(filePath)).toBe('hello');
    });

    it('should write bytes verbatim', async () => {
      const filePath = join(tempDir, 'logo.bin');

      await writeFile(filePath, new Uint8Array([0, 255, 16]));

      expect(Array.from(await readHead(filePath, 8))).toEqual([0, 255, 16]);
    });
  });

  describe('readHead', () => {
    it('should read no more than the requested bytes', async () => {
      const filePath = join(tempDir, 'tool');
      await fsWriteFile(filePath, '#!/bin/sh\necho hi\n');

      expect((await readHead(filePath, 2)).toString('utf-8')).toBe('#!');
    });

    it('should return an empty buffer for an empty file', async () => {
      const filePath = join(tempDir, 'empty');
      await fsWriteFile(filePath, '');

      expect((await readHead(filePath, 2)).length).toBe(0);
    });
  });

  describe('copyFile', () => {
    it('should copy into a new directory', async () => {
      const source = join(tempDir, 'src.bin');
      await fsWriteFile(source, Buffer.from([1, 2, 3]));

      await copyFile(source, join(tempDir, 'out', 'dst.bin'));

      expect(Array.from(await readHead(join(tempDir, 'out', 'dst.bin'), 3))).toEqual([1, 2, 3]);
    });
  });

  describe('existence checks', () => {
    it('should tell files and directories apart', async () => {
      const filePath = join(tempDir, 'file.txt');
      await fsWriteFile(filePath, 'x');

      expect(await fileExists(filePath)).toBe(true);
      expect(await isFile(filePath)).toBe(true);
      expect(await isDirectory(filePath)).toBe(false);
      expect(await isDirectory(tempDir)).toBe(true);
      expect(await isFile(tempDir)).toBe(false);
    });

    it('should report missing paths as absent', async () => {
      const missing = join(tempDir, 'missing');

      expect(await fileExists(missing)).toBe(false);
      expect(await isFile(missing)).toBe(false);
      expect(await isDirectory(missing)).toBe(false);
    });
  });

  describe('ensureDir / removePath', () => {
    it('should create and remove a directory tree', async () => {
      const dir = join(tempDir, 'x', 'y');

      await ensureDir(dir);
      expect(await isDirectory(dir)).toBe(true);

      await removePath(join(tempDir, 'x'));
      expect(await fileExists(join(tempDir, 'x'))).toBe(false);
    });

    it('should ignore missing paths on removal', async () => {
      await expect(removePath(join(tempDir, 'nothing'))).resolves.toBeUndefined();
    });
  });

  describe('listSubdirectories', () => {
    it('should list directories only, sorted', async () => {
      await mkdir(join(tempDir, 'server'));
      await mkdir(join(tempDir, 'client'));
      await fsWriteFile(join(tempDir, 'README.md'), '');

      expect(await listSubdirectories(tempDir)).toEqual(['client', 'server']);
    });

    it('should return an empty list for a missing directory', async () => {
      expect(await listSubdirectories(join(tempDir, 'missing'))).toEqual([]);
    });
  });

  describe('isEmptyDirectory', () => {
    it('should detect empty and non-empty directories', async () => {
      await mkdir(join(tempDir, 'empty'));
      await fsWriteFile(join(tempDir, 'file.txt'), '');

      expect(await isEmptyDirectory(join(tempDir, 'empty'))).toBe(true);
      expect(await isEmptyDirectory(tempDir)).toBe(false);
    });
  });

  describe('globFiles', () => {
    it('should return sorted relative paths including dotfiles when asked', async () => {
      await mkdir(join(tempDir, 'src'));
      await fsWriteFile(join(tempDir, 'src', 'main.rs'), '');
      await fsWriteFile(join(tempDir, '.gitignore'), '');
      await fsWriteFile(join(tempDir, 'Cargo.toml'), '');

      const files = await globFiles('**/*', { cwd: tempDir, absolute: false, dot: true, ignore: [] });

      expect(files).toEqual(['.gitignore', 'Cargo.toml', 'src/main.rs']);
    });

    it('should skip dotfiles by default', async () => {
      await fsWriteFile(join(tempDir, '.env'), '');
      await fsWriteFile(join(tempDir, 'main.rs'), '');

      const files = await globFiles('*', { cwd: tempDir, absolute: false });

      expect(files).toEqual(['main.rs']);
    });
  });

  describe('makeExecutable', () => {
    it.skipIf(process.platform === 'win32')('should add execute bits', async () => {
      const script = join(tempDir, 'run.sh');
      await fsWriteFile(script, '#!/bin/sh\n', { mode: 0o644 });

      await makeExecutable(script);

      expect((await stat(script)).mode & 0o111).toBe(0o111);
    });
  });

  describe('isWithin', () => {
    it('should accept the parent itself and its descendants', () => {
      expect(isWithin('/out', '/out')).toBe(true);
      expect(isWithin('/out', '/out/src/main.rs')).toBe(true);
    });

    it('should reject siblings and parents', () => {
      expect(isWithin('/out', '/outside')).toBe(false);
      expect(isWithin('/out', '/out/../etc')).toBe(false);
      expect(isWithin('/out/src', '/out')).toBe(false);
    });
  });

  describe('toPosixPath', () => {
    it('should leave forward slashes alone', () => {
      expect(toPosixPath('src/main.rs')).toBe('src/main.rs');
    });
  });
});
