import { InvalidChoiceError } from '../core/errors.js';
import { recordKey, type CarRecord, type Evaluation, type Round, type ScoredField } from '../core/types.js';

export interface EvaluateOptions {
  /**
   * Strict (default): make, model and year must all match. Relaxed: the year
   * is not compared. Neither mode gives partial credit.
   */
  strictScoring?: boolean;
}

/**
 * Score `submitted` against the round's target.
 *
 * @throws InvalidChoiceError when `submitted` was not offered in the round,
 *   matched by image and by make, model and year
 */
export function evaluate(round: Round, submitted: CarRecord, options: EvaluateOptions = {}): Evaluation {
  const offered = round.choices.find((choice) => choice.imagePath === submitted.imagePath);
  if (!offered || recordKey(offered) !== recordKey(submitted)) {
    throw new InvalidChoiceError(`Choice ${submitted.imagePath} is not part of round ${round.id}`, {
      roundId: round.id,
      imagePath: submitted.imagePath,
    });
  }

  const mismatched: ScoredField[] = [];
  if (submitted.make !== round.target.make) mismatched.push('make');
  if (submitted.model !== round.target.model) mismatched.push('model');
  if (submitted.year !== round.target.year) mismatched.push('year');

  const strict = options.strictScoring ?? true;
  const counted = strict ? mismatched : mismatched.filter((field) => field !== 'year');

  return { correct: counted.length === 0, mismatched };
}
