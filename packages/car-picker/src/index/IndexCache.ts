/**
 * Index cache artifact: the parsed records plus the directory signature and
 * lexicon version they were built from.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { CacheCorruptionError } from '../core/errors.js';
import { MAX_YEAR, MIN_YEAR } from '../core/types.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import { isNotFound } from '../utils/fsErrors.js';

export const INDEX_CACHE_VERSION = 1;

export const CarRecordSchema = z.object({
  make: z.string().min(1),
  model: z.string().min(1),
  year: z.number().int().min(MIN_YEAR).max(MAX_YEAR),
  imagePath: z.string().min(1),
});

export const IndexCacheSchema = z.object({
  version: z.literal(INDEX_CACHE_VERSION),
  lexiconVersion: z.string(),
  signature: z.string(),
  missCount: z.number().int().min(0),
  records: z.array(CarRecordSchema),
});

export type IndexCacheArtifact = z.infer<typeof IndexCacheSchema>;

/**
 * Read the artifact. Returns null when there is none yet and throws
 * CacheCorruptionError when the file exists but cannot be trusted.
 */
export async function readIndexCache(path: string): Promise<IndexCacheArtifact | null> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CacheCorruptionError(`Index cache at ${path} is not valid JSON`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = IndexCacheSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CacheCorruptionError(`Index cache at ${path} does not match the expected shape`, {
      path,
      issues: parsed.error.errors.slice(0, 5).map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }
  return parsed.data;
}

/**
 * Serialise with a fixed key order and no timestamps, so an unchanged
 * directory always produces the same bytes.
 */
export function serializeIndexCache(artifact: IndexCacheArtifact): string {
  const ordered: IndexCacheArtifact = {
    version: artifact.version,
    lexiconVersion: artifact.lexiconVersion,
    signature: artifact.signature,
    missCount: artifact.missCount,
    records: artifact.records.map((r) => ({
      make: r.make,
      model: r.model,
      year: r.year,
      imagePath: r.imagePath,
    })),
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

export async function writeIndexCache(path: string, artifact: IndexCacheArtifact): Promise<void> {
  await writeFileAtomic(path, serializeIndexCache(artifact));
}
