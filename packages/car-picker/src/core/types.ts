/**
 * Core domain types for car-picker
 */

// ============================================================================
// Index
// ============================================================================

/** A single parsed image entry. Identity is `imagePath`. */
export interface CarRecord {
  readonly make: string;
  readonly model: string;
  readonly year: number;
  /** POSIX path relative to the data directory */
  readonly imagePath: string;
}

export interface IndexBuildResult {
  records: readonly CarRecord[];
  missCount: number;
  signature: string;
  fromCache: boolean;
}

// ============================================================================
// Rounds
// ============================================================================

export interface Round {
  readonly id: string;
  readonly target: CarRecord;
  readonly choices: readonly CarRecord[];
  readonly presentedAt: Date;
}

export type ScoredField = 'make' | 'model' | 'year';

export interface Evaluation {
  correct: boolean;
  mismatched: ScoredField[];
}

// ============================================================================
// Sessions
// ============================================================================

export interface RoundOutcome {
  correct: boolean;
  chosen: CarRecord;
}

export interface HistoryEntry {
  roundId: string;
  target: CarRecord;
  chosen: CarRecord;
  correct: boolean;
  timestamp: Date;
}

export interface SessionStats {
  score: number;
  roundsPlayed: number;
  accuracy: number;
}

// ============================================================================
// Helpers
// ============================================================================

export const MIN_YEAR = 1950;
export const MAX_YEAR = 2030;

export function recordLabel(record: Pick<CarRecord, 'make' | 'model' | 'year'>): string {
  return `${record.make} ${record.model} ${record.year}`;
}

/** Key for the (make, model, year) triple, ignoring the image. */
export function recordKey(record: Pick<CarRecord, 'make' | 'model' | 'year'>): string {
  return `${record.make}\u0000${record.model}\u0000${record.year}`;
}
