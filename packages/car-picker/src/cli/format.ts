/**
 * Terminal formatting shared by the CLI commands.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  CarPickerError,
  DataDirectoryError,
  InsufficientDataError,
  InvalidChoiceError,
  LexiconError,
} from '../core/errors.js';
import { recordLabel, type HistoryEntry, type SessionStats } from '../core/types.js';

export function formatAccuracy(stats: SessionStats): string {
  return stats.roundsPlayed > 0 ? `${Math.round(stats.accuracy * 100)}%` : '-';
}

export function formatStats(stats: SessionStats): string {
  return `Score: ${stats.score}  Rounds: ${stats.roundsPlayed}  Accuracy: ${formatAccuracy(stats)}`;
}

export function historyTable(history: readonly HistoryEntry[]): string {
  const table = new Table({
    head: ['Result', 'Your choice', 'Correct answer'],
  });
  for (const entry of history) {
    table.push([
      entry.correct ? chalk.green('O') : chalk.red('X'),
      recordLabel(entry.chosen),
      recordLabel(entry.target),
    ]);
  }
  return table.toString();
}

/**
 * Player-facing copy for each failure kind.
 */
export function describeError(error: unknown): string {
  if (error instanceof InsufficientDataError) {
    return `Not enough data to start a round: ${error.available} distinct cars found, ${error.required} needed.`;
  }
  if (error instanceof InvalidChoiceError) {
    return `Internal error: ${error.message}`;
  }
  if (error instanceof DataDirectoryError || error instanceof LexiconError) {
    return error.message;
  }
  if (error instanceof CarPickerError) {
    return `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
