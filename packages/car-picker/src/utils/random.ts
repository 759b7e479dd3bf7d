/**
 * Seedable random source for round generation.
 *
 * Every random decision in the quiz goes through an injected `Rng`, never
 * `Math.random` directly, so a seed reproduces a round exactly.
 */

/** Returns a float in [0, 1). */
export type Rng = () => number;

/**
 * mulberry32: small, fast, 32-bit state PRNG.
 */
export function createRng(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** A fresh 32-bit seed for sessions that do not ask for one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}

/** Uniform integer in [0, max). A source that returns 1 maps to `max - 1`. */
export function randomInt(rng: Rng, max: number): number {
  return Math.min(max - 1, Math.floor(rng() * max));
}

export function pickOne<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[randomInt(rng, items.length)];
}

/** Fisher-Yates, returning a new array. */
export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}
