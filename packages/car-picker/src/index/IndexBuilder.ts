/**
 * IndexBuilder - turns a directory of car photos into CarRecords.
 *
 * Parse misses are absorbed here: they are counted and logged, never thrown.
 */

import { createHash } from 'node:crypto';
import { readdir, stat } from 'node:fs/promises';
import { join, posix } from 'node:path';
import type { Logger } from 'pino';
import { CacheCorruptionError, DataDirectoryError } from '../core/errors.js';
import type { CarRecord, IndexBuildResult } from '../core/types.js';
import { createSilentLogger } from '../utils/logger.js';
import { isSupportedImage, parseCarFilename } from './filename.js';
import { INDEX_CACHE_VERSION, readIndexCache, writeIndexCache } from './IndexCache.js';
import { isNotFound } from '../utils/fsErrors.js';
import type { Lexicon } from './Lexicon.js';

// ============================================================================
// Types
// ============================================================================

export interface ImageFile {
  /** POSIX path relative to the data directory */
  relativePath: string;
  size: number;
  mtimeMs: number;
}

export interface BuildIndexOptions {
  /** Where the cache artifact lives; without it nothing is cached */
  cachePath?: string;
  /** Ignore any existing cache and parse every file */
  force?: boolean;
  logger?: Logger;
}

// ============================================================================
// Directory scanning
// ============================================================================

/**
 * List every supported image under `dataDir`, sorted by relative path.
 */
export async function scanDirectory(dataDir: string): Promise<ImageFile[]> {
  await assertDirectory(dataDir);

  const files: ImageFile[] = [];
  const walk = async (dir: string, prefix: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const relativePath = prefix ? posix.join(prefix, entry.name) : entry.name;
      const absolutePath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(absolutePath, relativePath);
      } else if (entry.isFile() && isSupportedImage(entry.name)) {
        const info = await stat(absolutePath);
        files.push({ relativePath, size: info.size, mtimeMs: info.mtimeMs });
      }
    }
  };
  await walk(dataDir, '');

  return files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}

/**
 * Modification signature of the directory contents. Any added, removed,
 * resized or touched image changes it.
 */
export function directorySignature(files: readonly ImageFile[]): string {
  const hash = createHash('sha256');
  for (const file of files) {
    hash.update(`${file.relativePath}:${file.size}:${Math.trunc(file.mtimeMs)}\n`);
  }
  return hash.digest('hex');
}

async function assertDirectory(dataDir: string): Promise<void> {
  try {
    const info = await stat(dataDir);
    if (!info.isDirectory()) {
      throw new DataDirectoryError(`Data path is not a directory: ${dataDir}`, { dataDir });
    }
  } catch (error) {
    if (isNotFound(error)) {
      throw new DataDirectoryError(`Data directory not found: ${dataDir}`, { dataDir });
    }
    throw error;
  }
}

// ============================================================================
// Index build
// ============================================================================

/**
 * Parse the records for an already scanned file list.
 */
export function parseFiles(
  files: readonly ImageFile[],
  lexicon: Lexicon,
  logger: Logger = createSilentLogger()
): { records: CarRecord[]; missCount: number } {
  const records: CarRecord[] = [];
  let missCount = 0;

  for (const file of files) {
    const result = parseCarFilename(file.relativePath, lexicon);
    if (result.ok) {
      records.push(result.record);
    } else {
      missCount++;
      logger.debug({ file: file.relativePath, reason: result.reason }, 'Failed to parse car metadata');
    }
  }

  return { records, missCount };
}

/**
 * Build the index for `dataDir`, or load it from `options.cachePath` when
 * neither the directory nor the lexicon changed since it was written.
 */
export async function buildIndex(
  dataDir: string,
  lexicon: Lexicon,
  options: BuildIndexOptions = {}
): Promise<IndexBuildResult> {
  const logger = options.logger ?? createSilentLogger();
  const files = await scanDirectory(dataDir);
  const signature = directorySignature(files);

  if (options.cachePath && !options.force) {
    try {
      const cached = await readIndexCache(options.cachePath);
      if (cached && cached.signature === signature && cached.lexiconVersion === lexicon.version) {
        logger.debug({ records: cached.records.length, cachePath: options.cachePath }, 'Index loaded from cache');
        return { records: cached.records, missCount: cached.missCount, signature, fromCache: true };
      }
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) throw error;
      logger.warn({ err: error, cachePath: options.cachePath }, 'Index cache is corrupt, rebuilding');
    }
  }

  const { records, missCount } = parseFiles(files, lexicon, logger);

  if (options.cachePath) {
    await writeIndexCache(options.cachePath, {
      version: INDEX_CACHE_VERSION,
      lexiconVersion: lexicon.version,
      signature,
      missCount,
      records,
    });
  }

  logger.info({ records: records.length, missCount, files: files.length }, 'Index built');
  return { records, missCount, signature, fromCache: false };
}
