/**
 * Scoring - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidChoiceError } from '../../src/core/errors.js';
import { evaluate } from '../../src/quiz/scoring.js';
import { createCarRecord, createRound } from '../factories/index.js';

const target = createCarRecord({ make: 'Toyota', model: 'Corolla', year: 2010, imagePath: 'target.jpg' });
const sameCarOtherYear = createCarRecord({ make: 'Toyota', model: 'Corolla', year: 2012, imagePath: 'a.jpg' });
const otherModel = createCarRecord({ make: 'Toyota', model: 'Camry', year: 2010, imagePath: 'b.jpg' });
const otherCar = createCarRecord({ make: 'Honda', model: 'Civic', year: 2016, imagePath: 'c.jpg' });
const round = createRound(target, [sameCarOtherYear, otherModel, otherCar]);

describe('evaluate', () => {
  it('accepts the target', () => {
    expect(evaluate(round, target)).toEqual({ correct: true, mismatched: [] });
  });

  it('requires make, model and year to match in strict mode', () => {
    expect(evaluate(round, sameCarOtherYear)).toEqual({ correct: false, mismatched: ['year'] });
    expect(evaluate(round, otherModel)).toEqual({ correct: false, mismatched: ['model'] });
    expect(evaluate(round, otherCar)).toEqual({ correct: false, mismatched: ['make', 'model', 'year'] });
  });

  it('ignores the year in relaxed mode', () => {
    expect(evaluate(round, sameCarOtherYear, { strictScoring: false })).toEqual({
      correct: true,
      mismatched: ['year'],
    });
    expect(evaluate(round, otherModel, { strictScoring: false }).correct).toBe(false);
  });

  it('rejects a record that was not offered', () => {
    const stranger = createCarRecord({ imagePath: 'stranger.jpg' });
    expect(() => evaluate(round, stranger)).toThrow(InvalidChoiceError);
  });

  it('rejects an offered image carrying another car\'s details', () => {
    const forged = { ...target, imagePath: otherCar.imagePath };
    expect(() => evaluate(round, forged)).toThrow(InvalidChoiceError);
  });
});
