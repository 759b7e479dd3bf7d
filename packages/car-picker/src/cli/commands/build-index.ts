/**
 * Index Command - build or refresh the car metadata index
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { engineFromCommand } from '../engine.js';
import { describeError } from '../format.js';

interface IndexOptions {
  force?: boolean;
  json?: boolean;
}

export function createIndexCommand(): Command {
  const index = new Command('index');

  index
    .description('Build the car index from the data directory (uses the cache when nothing changed)')
    .option('-f, --force', 'Ignore the cache and re-parse every file')
    .option('--json', 'Output the build summary as JSON')
    .action(async (options: IndexOptions, command: Command) => {
      const spinner = ora('Building image index...').start();

      try {
        const engine = await engineFromCommand(command);
        const result = await engine.loadIndex({ force: options.force });
        spinner.stop();

        if (options.json) {
          console.log(
            JSON.stringify(
              {
                records: result.records.length,
                missCount: result.missCount,
                fromCache: result.fromCache,
                signature: result.signature,
                indexPath: engine.indexPath,
              },
              null,
              2
            )
          );
          return;
        }

        console.log(chalk.green(`✓ ${result.records.length} cars indexed`) + chalk.gray(result.fromCache ? ' (from cache)' : ''));
        if (result.missCount > 0) {
          console.log(chalk.yellow(`⚠ ${result.missCount} files could not be parsed (run with --debug to list them)`));
        }
        console.log(chalk.gray(`  Index: ${engine.indexPath}`));
      } catch (error) {
        spinner.fail(chalk.red('Index build failed'));
        console.error(chalk.red(describeError(error)));
        process.exitCode = 1;
      }
    });

  return index;
}
