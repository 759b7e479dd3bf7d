/**
 * Token normalisation shared by the lexicon and the filename parser.
 */

/** Lowercase, collapse every run of non-alphanumerics to a single space. */
export function normalizeName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/**
 * Strip encoding artifacts a filename picks up on its way through browsers
 * and scrapers: percent-escapes, `+` for space, control characters.
 */
export function cleanToken(token: string): string {
  const value = decodePercentEscapes(token.replace(/\+/g, ' '));
  // eslint-disable-next-line no-control-regex
  return value.replace(/[\u0000-\u001f\u007f\ufffd]/g, '').trim();
}

function decodePercentEscapes(value: string): string {
  if (!/%[0-9a-f]{2}/i.test(value)) return value;
  try {
    return decodeURIComponent(value);
  } catch (error) {
    // Malformed sequence (e.g. a lone `%E2`): keep the raw text
    if (error instanceof URIError) return value;
    throw error;
  }
}

function isUpperCase(token: string): boolean {
  return /\p{L}/u.test(token) && token === token.toUpperCase();
}

function capitalize(part: string): string {
  if (!part) return '';
  return part.charAt(0).toUpperCase() + part.slice(1).toLowerCase();
}

/**
 * Display form of a raw token. All-caps tokens (`ILX`, `F-150`) and pure
 * digits are kept as they are; anything else is title-cased with dashes read
 * as word breaks.
 */
export function humanizeToken(token: string): string {
  if (isUpperCase(token)) return token;
  if (/^\d+$/.test(token)) return token;
  return token
    .replace(/-/g, ' ')
    .split(' ')
    .map(capitalize)
    .join(' ')
    .trim();
}

export function humanizeTokens(tokens: readonly string[]): string {
  return tokens.map(humanizeToken).join(' ');
}
