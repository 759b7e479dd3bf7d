/**
 * Play Command - interactive quiz in the terminal
 */

import { join } from 'node:path';
import { createInterface } from 'node:readline/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { recordLabel, type HistoryEntry, type SessionStats } from '../../core/types.js';
import type { QuizEngine } from '../../QuizEngine.js';
import { engineFromCommand } from '../engine.js';
import { describeError, formatStats, historyTable } from '../format.js';

export interface PlayIO {
  ask(prompt: string): Promise<string>;
  print(line: string): void;
}

export interface PlayOptions {
  rounds?: number;
  seed?: number;
  /** Print a generated thumbnail path instead of the original image path */
  thumbnails?: boolean;
}

export interface PlaySummary {
  stats: SessionStats;
  history: HistoryEntry[];
  quit: boolean;
}

interface PlayCommandOptions {
  rounds?: string;
  seed?: string;
  thumbnails?: boolean;
}

const QUIT_ANSWERS = new Set(['q', 'quit', 'exit']);

/**
 * Returns the zero-based choice, or null when the player quits.
 */
async function askChoice(io: PlayIO, count: number): Promise<number | null> {
  for (;;) {
    const answer = (await io.ask(`Which car is this? [1-${count}, q to quit] `)).trim().toLowerCase();
    if (QUIT_ANSWERS.has(answer)) return null;

    const n = Number(answer);
    if (Number.isInteger(n) && n >= 1 && n <= count) return n - 1;
    io.print(chalk.yellow(`Please enter a number between 1 and ${count}.`));
  }
}

/**
 * Play rounds on a fresh session until `rounds` are done or the player quits.
 * The session is ended before returning.
 */
export async function runPlay(engine: QuizEngine, io: PlayIO, options: PlayOptions = {}): Promise<PlaySummary> {
  const session = engine.createSession({ seed: options.seed });
  let quit = false;

  try {
    let played = 0;
    while (options.rounds === undefined || played < options.rounds) {
      const round = engine.nextRound(session.id);
      const image = options.thumbnails
        ? await engine.thumbnailFor(round.target)
        : join(engine.dataDir, round.target.imagePath);

      io.print('');
      io.print(chalk.bold(`Round ${played + 1}`) + chalk.gray(`  ${image}`));
      round.choices.forEach((choice, i) => {
        io.print(`${String(i + 1).padStart(2)}. ${recordLabel(choice)}`);
      });

      const choice = await askChoice(io, round.choices.length);
      if (choice === null) {
        quit = true;
        break;
      }

      const result = engine.submitAnswer(session.id, round.choices[choice].imagePath);
      io.print(
        result.evaluation.correct
          ? chalk.green(`Correct! ${recordLabel(result.target)}`)
          : chalk.red(`Incorrect. You picked: ${recordLabel(result.chosen)} / Answer: ${recordLabel(result.target)}`)
      );
      io.print(chalk.gray(formatStats(result.stats)));
      played++;
    }

    return {
      stats: engine.getStats(session.id),
      history: engine.getHistory(session.id),
      quit,
    };
  } finally {
    engine.endSession(session.id);
  }
}

function parseIntOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

export function createPlayCommand(): Command {
  const play = new Command('play');

  play
    .description('Play the quiz in the terminal')
    .option('-r, --rounds <n>', 'Stop after this many rounds')
    .option('-s, --seed <n>', 'Seed the round generator for a reproducible game')
    .option('-t, --thumbnails', 'Generate and show thumbnail paths')
    .action(async (options: PlayCommandOptions, command: Command) => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      const closed = new Promise<string>((resolve) => rl.once('close', () => resolve('q')));
      const io: PlayIO = {
        ask: (prompt) => Promise.race([rl.question(prompt), closed]),
        print: (line) => console.log(line),
      };

      try {
        const engine = await engineFromCommand(command);
        const spinner = ora('Loading image index...').start();
        const build = await engine.loadIndex();
        spinner.succeed(`${build.records.length} cars loaded`);

        console.log(chalk.bold(`\n${engine.config.ui.title}`));
        console.log(chalk.gray(engine.config.ui.subtitle));

        const summary = await runPlay(engine, io, {
          rounds: parseIntOption(options.rounds, 'rounds'),
          seed: parseIntOption(options.seed, 'seed'),
          thumbnails: options.thumbnails,
        });

        if (summary.history.length > 0) {
          console.log(chalk.bold('\nRecent history'));
          console.log(historyTable(summary.history));
        }
        console.log(chalk.bold(`\n${formatStats(summary.stats)}`));
      } catch (error) {
        console.error(chalk.red(describeError(error)));
        process.exitCode = 1;
      } finally {
        rl.close();
      }
    });

  return play;
}
