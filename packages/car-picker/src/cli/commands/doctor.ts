/**
 * Doctor Command - health checks
 *
 * Checks:
 * - Data directory
 * - Index (enough distinct cars for a round)
 * - Pre-built documentation site, when `paths.docsDir` is set
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { HealthReport, QuizEngine } from '../../QuizEngine.js';
import { engineFromCommand } from '../engine.js';
import { describeError } from '../format.js';

interface DoctorOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Load the index (a failure becomes a failing check) and report health.
 */
export async function runDoctor(engine: QuizEngine): Promise<HealthReport> {
  let loadError: string | null = null;
  try {
    await engine.loadIndex();
  } catch (error) {
    loadError = describeError(error);
  }

  const report = await engine.getHealth();
  if (loadError) {
    const indexCheck = report.checks.find((check) => check.name === 'Index');
    if (indexCheck) {
      indexCheck.message = loadError;
    }
  }
  return report;
}

export function createDoctorCommand(): Command {
  const doctor = new Command('doctor');

  doctor
    .description('Run health checks')
    .option('--json', 'Output results as JSON')
    .option('-v, --verbose', 'Show detailed information')
    .action(async (options: DoctorOptions, command: Command) => {
      const spinner = ora('Running diagnostics...').start();

      try {
        const engine = await engineFromCommand(command);
        const report = await runDoctor(engine);
        spinner.stop();

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          console.log(chalk.bold('\nCar Picker Doctor\n'));
          console.log('─'.repeat(60));
          for (const check of report.checks) {
            const color = check.status === 'pass' ? chalk.green : chalk.red;
            console.log(color(`${check.status === 'pass' ? '✓' : '✗'} ${check.name}`));
            if (options.verbose || check.status !== 'pass') {
              console.log(chalk.gray(`  ${check.message}`));
            }
          }
          console.log('─'.repeat(60));
          console.log(
            report.status === 'ok'
              ? chalk.green('\n✓ All checks passed.')
              : chalk.yellow('\n⚠ Status: degraded')
          );
        }

        if (report.status !== 'ok') {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail(chalk.red('Diagnostics failed'));
        console.error(chalk.red(describeError(error)));
        process.exitCode = 1;
      }
    });

  return doctor;
}
