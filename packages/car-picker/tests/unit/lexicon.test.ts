/**
 * Lexicon - Unit Tests
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeAll, beforeEach, describe, it, expect } from 'vitest';
import { LexiconError } from '../../src/core/errors.js';
import { DEFAULT_LEXICON_URL, Lexicon, ensureLexicon, saveLexicon } from '../../src/index/Lexicon.js';
import { createTempDir, type TempDir } from '../factories/index.js';

describe('Lexicon', () => {
  let lexicon: Lexicon;

  beforeAll(async () => {
    lexicon = await Lexicon.fromDefaults();
  });

  it('loads the bundled manufacturer table', async () => {
    const bundled: unknown = JSON.parse(await readFile(DEFAULT_LEXICON_URL, 'utf-8'));
    expect(lexicon.toJSON()).toEqual(bundled);
    expect(lexicon.size).toBe(42);
  });

  it('resolves aliases to canonical names', () => {
    expect(lexicon.resolve('chevy')).toBe('Chevrolet');
    expect(lexicon.resolve('VW')).toBe('Volkswagen');
    expect(lexicon.resolve('mercedes-benz')).toBe('Mercedes-Benz');
  });

  it('falls back to a title-cased token', () => {
    expect(lexicon.resolve('rivian')).toBe('Rivian');
    expect(lexicon.has('rivian')).toBe(false);
  });

  it('prefers the longest leading alias', () => {
    expect(lexicon.resolveMake(['land', 'rover', 'defender'])).toEqual({ make: 'Land Rover', consumed: 2 });
    expect(lexicon.resolveMake(['alfa', 'romeo', 'giulia'])).toEqual({ make: 'Alfa Romeo', consumed: 2 });
    expect(lexicon.resolveMake(['rolls-royce', 'ghost'])).toEqual({ make: 'Rolls-Royce', consumed: 1 });
    expect(lexicon.resolveMake(['foo', 'bar'])).toBeNull();
  });

  it('changes version when an alias is added', async () => {
    const local = await Lexicon.fromDefaults();
    const before = local.version;
    local.addAlias('Chevrolet', 'chevvy');

    expect(local.resolve('Chevvy')).toBe('Chevrolet');
    expect(local.version).not.toBe(before);
  });

  it('hashes content independently of insertion order', () => {
    const a = new Lexicon({ Beta: ['b'], Alpha: ['a'] });
    const b = new Lexicon({ Alpha: ['a'], Beta: ['b'] });
    expect(a.version).toBe(b.version);
    expect(a.version).toHaveLength(16);
  });

  it('registers makes without aliases', () => {
    const local = new Lexicon({ Lotus: [] });
    expect(local.size).toBe(1);
    expect(local.has('lotus')).toBe(true);
  });
});

describe('lexicon persistence', () => {
  let dir: TempDir;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('writes the default table when the file is missing', async () => {
    const path = join(dir.path, 'index', 'lexicon.json');
    const created = await ensureLexicon(path);
    const saved: unknown = JSON.parse(await readFile(path, 'utf-8'));

    expect(created.size).toBe(42);
    expect(saved).toEqual((await Lexicon.fromDefaults()).toJSON());
    expect((await ensureLexicon(path)).version).toBe(created.version);
  });

  it('round-trips added aliases', async () => {
    const path = join(dir.path, 'lexicon.json');
    const lexicon = new Lexicon({ Nissan: ['nissan'] });
    lexicon.addAlias('Nissan', 'datsun');
    await saveLexicon(path, lexicon);

    const loaded = await ensureLexicon(path);
    expect(loaded.resolve('datsun')).toBe('Nissan');
    expect(loaded.version).toBe(lexicon.version);
  });

  it('rejects invalid JSON and invalid shapes', async () => {
    const broken = await dir.write('broken.json', '{ not json');
    const wrongShape = await dir.write('shape.json', JSON.stringify({ makes: [] }));

    await expect(ensureLexicon(broken)).rejects.toBeInstanceOf(LexiconError);
    await expect(ensureLexicon(wrongShape)).rejects.toBeInstanceOf(LexiconError);
  });
});
