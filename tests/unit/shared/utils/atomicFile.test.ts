import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { atomicWrite, isNotFound, modifiedAt, removeIfExists } from '@shared/utils/atomicFile';

describe('atomicFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cvm-inventory-atomic-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('atomicWrite', () => {
    it('should create missing directories and write the content', async () => {
      const target = join(dir, 'nested', 'deeper', 'file.json');

      await atomicWrite(target, '{"ok":true}');

      expect(await readFile(target, 'utf-8')).toBe('{"ok":true}');
    });

    it('should replace existing content and leave no temp files', async () => {
      const target = join(dir, 'file.txt');
      await writeFile(target, 'old');

      await atomicWrite(target, 'new');

      expect(await readFile(target, 'utf-8')).toBe('new');
      expect(await readdir(dir)).toEqual(['file.txt']);
    });

    it('should create the file readable only by its owner', async () => {
      const target = join(dir, 'secret.txt');

      await atomicWrite(target, 'x');

      expect((await stat(target)).mode & 0o777).toBe(0o600);
    });

    it('should fail and clean up when the target is a directory', async () => {
      const target = join(dir, 'occupied');
      await atomicWrite(join(target, 'inner.txt'), 'x');

      await expect(atomicWrite(target, 'y')).rejects.toThrow();
      expect(await readdir(dir)).toEqual(['occupied']);
    });
  });

  describe('removeIfExists', () => {
    it('should remove a file and succeed when it is already gone', async () => {
      const target = join(dir, 'gone.txt');
      await writeFile(target, 'x');

      await removeIfExists(target);
      await removeIfExists(target);

      expect(await readdir(dir)).toEqual([]);
    });
  });

  describe('modifiedAt', () => {
    it('should return null for a missing file', async () => {
      expect(await modifiedAt(join(dir, 'missing'))).toBeNull();
    });

    it('should return null when a parent path is a file', async () => {
      const file = join(dir, 'file.txt');
      await writeFile(file, 'x');

      expect(await modifiedAt(join(file, 'child'))).toBeNull();
    });

    it('should return the modification time in milliseconds', async () => {
      const target = join(dir, 'file.txt');
      await writeFile(target, 'x');

      expect(await modifiedAt(target)).toBe((await stat(target)).mtimeMs);
    });
  });

  describe('isNotFound', () => {
    it('should recognise missing paths only', () => {
      expect(isNotFound(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
      expect(isNotFound(Object.assign(new Error('under a file'), { code: 'ENOTDIR' }))).toBe(true);
      expect(isNotFound(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
      expect(isNotFound('ENOENT')).toBe(false);
      expect(isNotFound(null)).toBe(false);
    });
  });
});
