import { dirname, resolve } from 'node:path';
import type { Command } from 'commander';
import { ConfigManager } from '../core/QuizConfig.js';
import { QuizEngine } from '../QuizEngine.js';

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

/**
 * Build an engine from the global `--config` / `--debug` flags. Paths in a
 * config file are relative to the file itself.
 */
export async function engineFromCommand(command: Command): Promise<QuizEngine> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const configManager = globals.config
    ? await ConfigManager.fromFile(globals.config)
    : ConfigManager.fromEnv();

  if (globals.debug) {
    configManager.update({ logging: { level: 'debug', pretty: true } });
  }

  const baseDir = globals.config ? dirname(resolve(globals.config)) : process.cwd();
  return new QuizEngine({ configManager, baseDir });
}
