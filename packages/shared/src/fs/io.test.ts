import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { atomicWrite, readTextIfExists, isErrnoException } from './io';

describe('io', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'roster-io-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('atomicWrite', () => {
    it('creates missing parent directories', async () => {
      const target = path.join(tmpDir, 'nested', 'dir', 'repos.txt');
      await atomicWrite(target, '/a\n');
      expect(await fs.readFile(target, 'utf8')).toBe('/a\n');
    });

    it('replaces existing content and leaves no temp files behind', async () => {
      const target = path.join(tmpDir, 'repos.txt');
      await atomicWrite(target, 'old\n');
      await atomicWrite(target, 'new\n');

      expect(await fs.readFile(target, 'utf8')).toBe('new\n');
      expect(await fs.readdir(tmpDir)).toEqual(['repos.txt']);
    });

    it('keeps the previous file when the rename fails', async () => {
      // A non-empty directory at the destination makes rename fail.
      const target = path.join(tmpDir, 'occupied');
      await fs.mkdir(target);
      await fs.writeFile(path.join(target, 'keep.txt'), 'x');

      await expect(atomicWrite(target, 'data')).rejects.toThrow();
      expect(await fs.readdir(tmpDir)).toEqual(['occupied']);
      expect(await fs.readFile(path.join(target, 'keep.txt'), 'utf8')).toBe('x');
    });
  });

  describe('isErrnoException', () => {
    it('recognises errors carrying a code', () => {
      expect(isErrnoException(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe(true);
      expect(isErrnoException(new Error('x'))).toBe(false);
      expect(isErrnoException('ENOENT')).toBe(false);
    });
  });

  describe('readTextIfExists', () => {
    it('returns null for a missing file', async () => {
      expect(await readTextIfExists(path.join(tmpDir, 'missing.txt'))).toBeNull();
    });

    it('returns file content', async () => {
      const file = path.join(tmpDir, 'a.txt');
      await fs.writeFile(file, 'hello');
      expect(await readTextIfExists(file)).toBe('hello');
    });

    it('rethrows errors other than ENOENT', async () => {
      await expect(readTextIfExists(tmpDir)).rejects.toMatchObject({ code: 'EISDIR' });
    });
  });
});
