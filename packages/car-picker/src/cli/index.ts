/**
 * car-picker CLI
 *
 * Usage:
 *   car-picker <command> [options]
 *
 * Commands:
 *   index       Build or refresh the car index
 *   play        Play the quiz in the terminal
 *   doctor      Run health checks
 *   lexicon     List or add manufacturer aliases
 */

import { Command } from 'commander';
import {
  createDoctorCommand,
  createIndexCommand,
  createLexiconCommand,
  createPlayCommand,
} from './commands/index.js';

const VERSION = '0.1.0';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('car-picker')
    .description('Guess the make, model and year of a car from its photo')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to a JSON config file')
    .option('--debug', 'Enable debug logging');

  program.addCommand(createIndexCommand());
  program.addCommand(createPlayCommand());
  program.addCommand(createDoctorCommand());
  program.addCommand(createLexiconCommand());

  return program;
}

export * from './commands/index.js';
