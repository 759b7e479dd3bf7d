/**
 * IndexBuilder - Unit Tests
 */

import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DataDirectoryError } from '../../src/core/errors.js';
import { buildIndex, directorySignature, scanDirectory } from '../../src/index/IndexBuilder.js';
import { readIndexCache } from '../../src/index/IndexCache.js';
import { Lexicon } from '../../src/index/Lexicon.js';
import { createCarDirectory, type TempDir } from '../factories/index.js';

describe('IndexBuilder', () => {
  let data: TempDir;
  let cachePath: string;

  beforeEach(async () => {
    data = await createCarDirectory();
    await data.write('notes.txt', 'not an image');
    cachePath = join(data.path, '.index', 'cars_index.json');
  });

  afterEach(async () => {
    await data.cleanup();
  });

  describe('scanDirectory', () => {
    it('lists supported images recursively in path order', async () => {
      const files = await scanDirectory(data.path);
      const paths = files.map((f) => f.relativePath);

      expect(paths).toHaveLength(13);
      expect(paths[0]).toBe('Acura_ILX_2013_x7f3a.jpg');
      expect(paths[paths.length - 1]).toBe('sub/Audi_A4_2018_bb22.jpeg');
      expect(paths).not.toContain('notes.txt');
    });

    it('rejects a missing directory', async () => {
      await expect(scanDirectory(join(data.path, 'nope'))).rejects.toBeInstanceOf(DataDirectoryError);
    });

    it('rejects a file given as the directory', async () => {
      await expect(scanDirectory(join(data.path, 'notes.txt'))).rejects.toBeInstanceOf(DataDirectoryError);
    });
  });

  describe('directorySignature', () => {
    it('changes when a file is added', async () => {
      const before = directorySignature(await scanDirectory(data.path));
      expect(directorySignature(await scanDirectory(data.path))).toBe(before);

      await data.write('Kia_Soul_2014_kk11.jpg');
      expect(directorySignature(await scanDirectory(data.path))).not.toBe(before);
    });
  });

  describe('buildIndex', () => {
    it('parses records and counts misses', async () => {
      const result = await buildIndex(data.path, await Lexicon.fromDefaults());

      expect(result.fromCache).toBe(false);
      expect(result.records).toHaveLength(12);
      expect(result.missCount).toBe(1);
      expect(result.records[0]).toEqual({
        make: 'Acura',
        model: 'ILX',
        year: 2013,
        imagePath: 'Acura_ILX_2013_x7f3a.jpg',
      });
      expect(result.records).toContainEqual({
        make: 'Audi',
        model: 'A4',
        year: 2018,
        imagePath: 'sub/Audi_A4_2018_bb22.jpeg',
      });
    });

    it('reuses the cache when nothing changed', async () => {
      const lexicon = await Lexicon.fromDefaults();
      const first = await buildIndex(data.path, lexicon, { cachePath });
      const second = await buildIndex(data.path, lexicon, { cachePath });

      expect(second.fromCache).toBe(true);
      expect(second.records).toEqual(first.records);
      expect(second.missCount).toBe(1);
      expect(second.signature).toBe(first.signature);
    });

    it('writes byte-identical artifacts for an unchanged directory', async () => {
      const lexicon = await Lexicon.fromDefaults();
      await buildIndex(data.path, lexicon, { cachePath });
      const first = await readFile(cachePath, 'utf-8');

      const rebuilt = await buildIndex(data.path, lexicon, { cachePath, force: true });
      expect(rebuilt.fromCache).toBe(false);
      expect(await readFile(cachePath, 'utf-8')).toBe(first);
      expect(await readdir(join(data.path, '.index'))).toEqual(['cars_index.json']);
    });

    it('rebuilds when the directory changes', async () => {
      const lexicon = await Lexicon.fromDefaults();
      await buildIndex(data.path, lexicon, { cachePath });
      await data.write('Kia_Soul_2014_kk11.jpg');

      const result = await buildIndex(data.path, lexicon, { cachePath });
      expect(result.fromCache).toBe(false);
      expect(result.records).toHaveLength(13);
    });

    it('rebuilds when the lexicon changes', async () => {
      const lexicon = await Lexicon.fromDefaults();
      await buildIndex(data.path, lexicon, { cachePath });
      lexicon.addAlias('Mazda', 'mazda speed');

      const result = await buildIndex(data.path, lexicon, { cachePath });
      expect(result.fromCache).toBe(false);
    });

    it('rebuilds over a corrupt cache', async () => {
      const lexicon = await Lexicon.fromDefaults();
      await buildIndex(data.path, lexicon, { cachePath });
      await writeFile(cachePath, '{ truncated');

      const result = await buildIndex(data.path, lexicon, { cachePath });
      expect(result.fromCache).toBe(false);
      expect(result.records).toHaveLength(12);
      expect(await readIndexCache(cachePath)).not.toBeNull();
    });

    it('fails on a missing data directory', async () => {
      await expect(buildIndex(join(data.path, 'missing'), await Lexicon.fromDefaults())).rejects.toThrow(
        DataDirectoryError
      );
    });
  });
});
