/**
 * Session tracking - score, accuracy and recent history for one player.
 *
 * A SessionState belongs to exactly one player; the engine keeps one per
 * session id and never shares them.
 */

import { v4 as uuidv4 } from 'uuid';
import type { HistoryEntry, Round, RoundOutcome, SessionStats } from '../core/types.js';
import { BoundedHistory } from '../utils/BoundedHistory.js';
import { createRng, randomSeed, type Rng } from '../utils/random.js';

export const HISTORY_LIMIT = 25;

export interface SessionState {
  readonly id: string;
  score: number;
  roundsPlayed: number;
  readonly history: BoundedHistory<HistoryEntry>;
  readonly rngSeed: number;
  readonly rng: Rng;
  currentRound: Round | null;
  answered: boolean;
  readonly createdAt: Date;
}

export interface CreateSessionOptions {
  id?: string;
  seed?: number;
  historyLimit?: number;
}

export function createSessionState(options: CreateSessionOptions = {}): SessionState {
  const rngSeed = options.seed ?? randomSeed();
  return {
    id: options.id ?? uuidv4(),
    score: 0,
    roundsPlayed: 0,
    history: new BoundedHistory<HistoryEntry>(options.historyLimit ?? HISTORY_LIMIT),
    rngSeed,
    rng: createRng(rngSeed),
    currentRound: null,
    answered: false,
    createdAt: new Date(),
  };
}

export function recordOutcome(
  session: SessionState,
  round: Round,
  outcome: RoundOutcome,
  timestamp: Date = new Date()
): HistoryEntry {
  if (outcome.correct) {
    session.score++;
  }
  session.roundsPlayed++;

  const entry: HistoryEntry = {
    roundId: round.id,
    target: round.target,
    chosen: outcome.chosen,
    correct: outcome.correct,
    timestamp,
  };
  session.history.push(entry);
  return entry;
}

/** Share of correct answers; 0 before the first round. */
export function accuracy(session: Pick<SessionState, 'score' | 'roundsPlayed'>): number {
  if (session.roundsPlayed === 0) return 0;
  return session.score / session.roundsPlayed;
}

export function sessionStats(session: SessionState): SessionStats {
  return {
    score: session.score,
    roundsPlayed: session.roundsPlayed,
    accuracy: accuracy(session),
  };
}
