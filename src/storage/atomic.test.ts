import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { StorageError } from '../pipeline/errors.js';
import {
  atomicWriteJson,
  fileExists,
  isErrnoException,
  listJsonIds,
  readDocument,
  readJson,
} from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteJson', () => {
    it('creates file with correct content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      const data = { foo: 'bar', num: 42 };

      await atomicWriteJson(filePath, data);

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual(data);
    });

    it('creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'test.json');
      await atomicWriteJson(filePath, { test: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ test: true });
    });

    it('uses 2-space indentation', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { a: 1 });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('{\n  "a": 1\n}');
    });

    it('overwrites existing file and leaves no temp files behind', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { first: true });
      await atomicWriteJson(filePath, { second: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ second: true });
      expect(await fs.readdir(tempDir)).toEqual(['test.json']);
    });

    it('throws StorageError when the target is a directory', async () => {
      const dirPath = path.join(tempDir, 'taken');
      await fs.mkdir(path.join(dirPath, 'child'), { recursive: true });

      await expect(atomicWriteJson(dirPath, { a: 1 })).rejects.toThrow(StorageError);
      expect((await fs.readdir(tempDir)).sort()).toEqual(['taken']);
    });
  });

  describe('readJson', () => {
    it('returns parsed content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{"foo":"bar"}');

      expect(await readJson(filePath)).toEqual({ foo: 'bar' });
    });

    it('throws for a missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      await expect(readJson(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });

    it('throws for invalid JSON', async () => {
      const filePath = path.join(tempDir, 'bad.json');
      await fs.writeFile(filePath, '{not json');
      await expect(readJson(filePath)).rejects.toThrow(`Invalid JSON in file: ${filePath}`);
    });
  });

  describe('readDocument', () => {
    const schema = z.object({ schemaVersion: z.number(), id: z.string(), source: z.string() });

    it('returns null for a missing file', async () => {
      expect(
        await readDocument(path.join(tempDir, 'none.json'), schema, 'contextItem')
      ).toBeNull();
    });

    it('returns the validated document', async () => {
      const filePath = path.join(tempDir, 'item.json');
      await fs.writeFile(filePath, JSON.stringify({ schemaVersion: 1, id: 'a', source: 'x' }));

      expect(await readDocument(filePath, schema, 'contextItem')).toEqual({
        schemaVersion: 1,
        id: 'a',
        source: 'x',
      });
    });

    it('reports the failing fields of a corrupt document', async () => {
      const filePath = path.join(tempDir, 'item.json');
      await fs.writeFile(filePath, JSON.stringify({ schemaVersion: 1, id: 7, source: 'x' }));

      await expect(readDocument(filePath, schema, 'contextItem')).rejects.toThrow(
        `Corrupt document ${filePath}: id: Expected string, received number`
      );
    });
  });

  describe('fileExists', () => {
    it('distinguishes files from directories and missing paths', async () => {
      const filePath = path.join(tempDir, 'file.json');
      await fs.writeFile(filePath, '{}');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(tempDir)).toBe(false);
      expect(await fileExists(path.join(tempDir, 'missing'))).toBe(false);
    });
  });

  describe('listJsonIds', () => {
    it('lists ids of json files only', async () => {
      await fs.writeFile(path.join(tempDir, 'a.json'), '{}');
      await fs.writeFile(path.join(tempDir, 'b.json'), '{}');
      await fs.writeFile(path.join(tempDir, 'notes.txt'), '');

      expect((await listJsonIds(tempDir)).sort()).toEqual(['a', 'b']);
    });

    it('returns an empty list for a missing directory', async () => {
      expect(await listJsonIds(path.join(tempDir, 'missing'))).toEqual([]);
    });
  });

  describe('isErrnoException', () => {
    it('recognises errors thrown by fs', async () => {
      const error = await fs.stat(path.join(tempDir, 'missing.json')).catch((e: unknown) => e);

      expect(isErrnoException(error)).toBe(true);
      expect(isErrnoException(error) && error.code).toBe('ENOENT');
    });

    it('goes by shape rather than prototype', () => {
      expect(isErrnoException({ code: 'EEXIST', message: 'exists' })).toBe(true);
    });

    it('rejects values without a string code', () => {
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException({ code: 17 })).toBe(false);
      expect(isErrnoException(null)).toBe(false);
      expect(isErrnoException('ENOENT')).toBe(false);
    });
  });
});
