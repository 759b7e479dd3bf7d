/**
 * Filename → CarRecord parsing.
 *
 * Expected shape: `<make tokens>_<model tokens>_<year>[_<anything>]_<hash>.<ext>`,
 * e.g. `Acura_ILX_2013_x7f3a.jpg`.
 *
 * Selection rules, applied in this order:
 *   1. The trailing token is a random hash and is dropped, unless it is
 *      itself an in-range year (`Acura_ILX_2013.jpg`).
 *   2. The make is the longest lexicon alias over the first 1-3 tokens; with
 *      no alias match it is the first token, title-cased.
 *   3. The year is the FIRST token after the make that is a four-digit year
 *      in [MIN_YEAR, MAX_YEAR]. Later year-like tokens are ignored, and
 *      out-of-range four-digit tokens stay part of the model.
 *   4. The model is every token between the make and the year.
 */

import { posix } from 'node:path';
import { MAX_YEAR, MIN_YEAR, type CarRecord } from '../core/types.js';
import type { Lexicon } from './Lexicon.js';
import { cleanToken, humanizeTokens } from './text.js';

export const TOKEN_DELIMITER = '_';
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(['.jpg', '.jpeg', '.png']);

const YEAR_PATTERN = /^(19|20)\d{2}$/;

export type ParseMissReason = 'empty' | 'no-year' | 'no-model';

export type ParseResult =
  | { ok: true; record: CarRecord }
  | { ok: false; reason: ParseMissReason };

export function isSupportedImage(path: string): boolean {
  return SUPPORTED_EXTENSIONS.has(posix.extname(path).toLowerCase());
}

export function isYearToken(token: string): boolean {
  if (!YEAR_PATTERN.test(token)) return false;
  const year = Number(token);
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Split a file stem into cleaned tokens and drop the trailing hash.
 */
export function tokenizeStem(stem: string): string[] {
  const tokens = stem
    .split(TOKEN_DELIMITER)
    .map(cleanToken)
    .filter((token) => token.length > 0);

  if (tokens.length > 1 && !isYearToken(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens;
}

/** Index of the first in-range year at or after `from`, or -1. */
export function findYearIndex(tokens: readonly string[], from = 0): number {
  for (let i = from; i < tokens.length; i++) {
    if (isYearToken(tokens[i])) return i;
  }
  return -1;
}

/**
 * Parse one image path (relative to the data directory, POSIX separators).
 */
export function parseCarFilename(imagePath: string, lexicon: Lexicon): ParseResult {
  const stem = posix.basename(imagePath, posix.extname(imagePath));
  const tokens = tokenizeStem(stem);
  if (tokens.length === 0) {
    return { ok: false, reason: 'empty' };
  }

  const match = lexicon.resolveMake(tokens);
  const make = match?.make ?? lexicon.resolve(tokens[0]);
  const consumed = match?.consumed ?? 1;

  const yearIndex = findYearIndex(tokens, consumed);
  if (yearIndex === -1) {
    return { ok: false, reason: 'no-year' };
  }

  const modelTokens = tokens.slice(consumed, yearIndex);
  if (modelTokens.length === 0) {
    return { ok: false, reason: 'no-model' };
  }

  return {
    ok: true,
    record: {
      make,
      model: humanizeTokens(modelTokens),
      year: Number(tokens[yearIndex]),
      imagePath,
    },
  };
}
