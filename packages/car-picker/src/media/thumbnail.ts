/**
 * Thumbnail cache for quiz images.
 */

import { mkdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import sharp from 'sharp';
import { isNotFound } from '../utils/fsErrors.js';

export interface ThumbnailOptions {
  maxWidth: number;
  quality?: number;
}

export function thumbnailName(imagePath: string, maxWidth: number): string {
  return `${basename(imagePath, extname(imagePath))}_${maxWidth}px.jpg`;
}

/**
 * Return a JPEG no wider than `maxWidth` for `imagePath`, regenerating it when
 * missing or older than the source.
 */
export async function ensureThumbnail(
  imagePath: string,
  cacheDir: string,
  options: ThumbnailOptions
): Promise<string> {
  await mkdir(cacheDir, { recursive: true });
  const thumbPath = join(cacheDir, thumbnailName(imagePath, options.maxWidth));

  const source = await stat(imagePath);
  const existing = await statOrNull(thumbPath);
  if (existing && existing.mtimeMs >= source.mtimeMs) {
    return thumbPath;
  }

  await sharp(imagePath)
    .rotate()
    .resize({ width: options.maxWidth, withoutEnlargement: true })
    .flatten({ background: '#ffffff' })
    .jpeg({ quality: options.quality ?? 85 })
    .toFile(thumbPath);

  return thumbPath;
}

async function statOrNull(path: string): Promise<{ mtimeMs: number } | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}
