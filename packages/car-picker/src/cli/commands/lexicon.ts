/**
 * Lexicon Commands - inspect and extend the manufacturer alias table
 */

import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { engineFromCommand } from '../engine.js';
import { describeError } from '../format.js';

export function createLexiconCommand(): Command {
  const lexicon = new Command('lexicon');
  lexicon.description('Manage manufacturer aliases');

  lexicon
    .command('list')
    .description('List canonical makes and their aliases')
    .action(async (_options: Record<string, never>, command: Command) => {
      try {
        const engine = await engineFromCommand(command);
        const { makes } = (await engine.reloadLexicon()).toJSON();

        const table = new Table({ head: ['Make', 'Aliases'] });
        for (const [canonical, aliases] of Object.entries(makes)) {
          table.push([canonical, aliases.join(', ')]);
        }
        console.log(table.toString());
      } catch (error) {
        console.error(chalk.red(describeError(error)));
        process.exitCode = 1;
      }
    });

  lexicon
    .command('add <canonical> <alias>')
    .description('Add an alias; the index picks it up on the next rebuild')
    .action(async (canonical: string, alias: string, _options: Record<string, never>, command: Command) => {
      try {
        const engine = await engineFromCommand(command);
        await engine.addLexiconAlias(canonical, alias);
        console.log(chalk.green(`✓ "${alias}" → ${canonical}`));
        console.log(chalk.gray('  Run `car-picker index` to rebuild with the new alias.'));
      } catch (error) {
        console.error(chalk.red(describeError(error)));
        process.exitCode = 1;
      }
    });

  return lexicon;
}
