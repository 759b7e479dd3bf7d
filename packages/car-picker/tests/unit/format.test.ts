import { describe, it, expect } from 'vitest';
import { describeError, formatAccuracy, formatStats } from '../../src/cli/format.js';
import { DataDirectoryError, InsufficientDataError, InvalidChoiceError, SessionError } from '../../src/core/errors.js';

describe('CLI formatting', () => {
  it('formats stats', () => {
    expect(formatAccuracy({ score: 0, roundsPlayed: 0, accuracy: 0 })).toBe('-');
    expect(formatStats({ score: 3, roundsPlayed: 4, accuracy: 0.75 })).toBe('Score: 3  Rounds: 4  Accuracy: 75%');
  });

  it('describes each failure kind', () => {
    expect(describeError(new InsufficientDataError(10, 5))).toBe(
      'Not enough data to start a round: 5 distinct cars found, 10 needed.'
    );
    expect(describeError(new InvalidChoiceError('bad choice'))).toBe('Internal error: bad choice');
    expect(describeError(new DataDirectoryError('Data directory not found: /x'))).toBe('Data directory not found: /x');
    expect(describeError(new SessionError('gone'))).toBe('SessionError: gone');
    expect(describeError('plain')).toBe('plain');
  });
});
