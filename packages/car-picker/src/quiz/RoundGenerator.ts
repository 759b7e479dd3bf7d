/**
 * Round generation: one target plus look-alike distractors.
 */

import { v4 as uuidv4 } from 'uuid';
import { InsufficientDataError } from '../core/errors.js';
import { recordKey, type CarRecord, type Round } from '../core/types.js';
import { pickOne, shuffle, type Rng } from '../utils/random.js';

export const DEFAULT_NUM_CHOICES = 10;

export interface GenerateRoundOptions {
  numChoices?: number;
  now?: () => Date;
}

/**
 * One record per distinct (make, model, year), keeping the first in index
 * order. A round never offers two choices with the same label.
 */
export function representativesByKey(index: readonly CarRecord[]): Map<string, CarRecord> {
  const representatives = new Map<string, CarRecord>();
  for (const record of index) {
    const key = recordKey(record);
    if (!representatives.has(key)) {
      representatives.set(key, record);
    }
  }
  return representatives;
}

/**
 * Pick distractors for `target`: every same-make candidate first, then the
 * other makes. Within each group the closest year comes first and equal
 * distances are in random order.
 */
export function pickDistractors(
  target: CarRecord,
  candidates: readonly CarRecord[],
  needed: number,
  rng: Rng
): CarRecord[] {
  const byYearDistance = (a: CarRecord, b: CarRecord): number =>
    Math.abs(a.year - target.year) - Math.abs(b.year - target.year);

  const sameMake = shuffle(
    rng,
    candidates.filter((c) => c.make === target.make)
  ).sort(byYearDistance);
  const otherMakes = shuffle(
    rng,
    candidates.filter((c) => c.make !== target.make)
  ).sort(byYearDistance);

  return [...sameMake, ...otherMakes].slice(0, needed);
}

/**
 * Generate a round from `index` using `rng` for every random choice.
 *
 * @throws InsufficientDataError when the index has fewer distinct
 *   (make, model, year) triples than choices
 */
export function generateRound(
  index: readonly CarRecord[],
  rng: Rng,
  options: GenerateRoundOptions = {}
): Round {
  const numChoices = options.numChoices ?? DEFAULT_NUM_CHOICES;
  if (!Number.isInteger(numChoices) || numChoices < 2) {
    throw new RangeError(`numChoices must be an integer of at least 2, got ${numChoices}`);
  }

  const representatives = representativesByKey(index);
  if (representatives.size < numChoices) {
    throw new InsufficientDataError(numChoices, representatives.size);
  }

  const target = pickOne(rng, index);
  const targetKey = recordKey(target);
  const candidates = [...representatives.entries()]
    .filter(([key]) => key !== targetKey)
    .map(([, record]) => record);

  const distractors = pickDistractors(target, candidates, numChoices - 1, rng);
  const choices = shuffle(rng, [target, ...distractors]);

  return {
    id: uuidv4(),
    target,
    choices,
    presentedAt: options.now ? options.now() : new Date(),
  };
}
