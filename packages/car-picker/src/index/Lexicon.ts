/**
 * Lexicon - canonical manufacturer names and their aliases.
 *
 * The alias table is read-only while sessions play; `addAlias` extends it for
 * the next index rebuild without touching records that were already parsed.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from 'pino';
import { LexiconError } from '../core/errors.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import { isNotFound } from '../utils/fsErrors.js';
import { createSilentLogger } from '../utils/logger.js';
import { humanizeToken, normalizeName } from './text.js';

// ============================================================================
// Types
// ============================================================================

export const LexiconSchema = z.object({
  makes: z.record(z.string().min(1), z.array(z.string())),
});

export type LexiconData = z.infer<typeof LexiconSchema>;

export interface MakeMatch {
  make: string;
  /** Number of leading tokens the match used */
  consumed: number;
}

/** Longest alias, in tokens, that `resolveMake` tries. */
const MAX_MAKE_TOKENS = 3;

export const DEFAULT_LEXICON_URL = new URL('../../data/default-lexicon.json', import.meta.url);

// ============================================================================
// Lexicon
// ============================================================================

export class Lexicon {
  private readonly makes: Map<string, string[]> = new Map();
  private readonly aliasLookup: Map<string, string> = new Map();

  constructor(makes: Record<string, string[]>) {
    for (const [canonical, aliases] of Object.entries(makes)) {
      this.makes.set(canonical, []);
      this.register(canonical, canonical);
      for (const alias of aliases) {
        this.addAlias(canonical, alias);
      }
    }
  }

  /**
   * The bundled manufacturer table.
   */
  static async fromDefaults(): Promise<Lexicon> {
    const raw: unknown = JSON.parse(await readFile(DEFAULT_LEXICON_URL, 'utf-8'));
    return new Lexicon(LexiconSchema.parse(raw).makes);
  }

  /**
   * Canonical name for a raw token; a title-cased token when unknown.
   */
  resolve(rawToken: string): string {
    return this.aliasLookup.get(normalizeName(rawToken)) ?? humanizeToken(rawToken);
  }

  /**
   * Match the manufacturer against the leading tokens, longest window first
   * so `alfa_romeo_...` resolves to "Alfa Romeo" rather than stopping at "alfa".
   */
  resolveMake(tokens: readonly string[]): MakeMatch | null {
    const maxWindow = Math.min(tokens.length, MAX_MAKE_TOKENS);
    for (let size = maxWindow; size > 0; size--) {
      const candidate = normalizeName(tokens.slice(0, size).join(' '));
      const match = this.aliasLookup.get(candidate);
      if (match) {
        return { make: match, consumed: size };
      }
    }
    return null;
  }

  addAlias(canonical: string, alias: string): void {
    const aliases = this.makes.get(canonical) ?? [];
    if (!aliases.includes(alias)) {
      aliases.push(alias);
    }
    this.makes.set(canonical, aliases);
    this.register(alias, canonical);
    this.register(canonical, canonical);
  }

  has(rawToken: string): boolean {
    return this.aliasLookup.has(normalizeName(rawToken));
  }

  get size(): number {
    return this.makes.size;
  }

  /**
   * Content hash; changes whenever an alias is added so cached indexes built
   * with an older table are rebuilt.
   */
  get version(): string {
    return createHash('sha256').update(JSON.stringify(this.toJSON())).digest('hex').slice(0, 16);
  }

  toJSON(): LexiconData {
    const makes: Record<string, string[]> = {};
    for (const canonical of [...this.makes.keys()].sort()) {
      makes[canonical] = [...(this.makes.get(canonical) ?? [])];
    }
    return { makes };
  }

  private register(alias: string, canonical: string): void {
    const key = normalizeName(alias);
    if (key) {
      this.aliasLookup.set(key, canonical);
    }
  }
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * Load the lexicon artifact, writing the default table there first when it
 * does not exist yet.
 */
export async function ensureLexicon(path: string, logger: Logger = createSilentLogger()): Promise<Lexicon> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      const lexicon = await Lexicon.fromDefaults();
      await saveLexicon(path, lexicon);
      logger.info({ path, makes: lexicon.size }, 'Wrote default lexicon');
      return lexicon;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new LexiconError(`Lexicon at ${path} is not valid JSON`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = LexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LexiconError(`Lexicon at ${path} does not match the expected shape`, {
      path,
      issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }

  const lexicon = new Lexicon(parsed.data.makes);
  logger.debug({ path, makes: lexicon.size, version: lexicon.version }, 'Loaded lexicon');
  return lexicon;
}

export async function saveLexicon(path: string, lexicon: Lexicon): Promise<void> {
  await writeFileAtomic(path, `${JSON.stringify(lexicon.toJSON(), null, 2)}\n`);
}
