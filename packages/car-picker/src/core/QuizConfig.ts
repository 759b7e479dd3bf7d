/**
 * Quiz configuration management
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Configuration Schema
// ============================================================================

export const QuizSettingsSchema = z.object({
  numChoices: z.literal(10).default(10),
  strictScoring: z.boolean().default(true),
  historySize: z.literal(25).default(25),
});

export const ImagesConfigSchema = z.object({
  thumbnailWidth: z.number().int().min(32).max(4096).default(400),
});

export const PathsConfigSchema = z.object({
  dataDir: z.string().min(1).default('./data/cars'),
  indexDir: z.string().min(1).default('./index'),
  assetsDir: z.string().min(1).default('./assets'),
  docsDir: z.string().min(1).optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(false),
});

export const UIConfigSchema = z.object({
  title: z.string().default('Car Picker'),
  subtitle: z.string().default('Guess the make, model and year of the car in the picture'),
});

export const QuizConfigSchema = z.object({
  quiz: QuizSettingsSchema.default({}),
  images: ImagesConfigSchema.default({}),
  paths: PathsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  ui: UIConfigSchema.default({}),
});

export type QuizConfig = z.infer<typeof QuizConfigSchema>;
export type QuizConfigInput = z.input<typeof QuizConfigSchema>;
export type LogLevel = QuizConfig['logging']['level'];

// ============================================================================
// Configuration Manager
// ============================================================================

export class ConfigManager {
  private config: QuizConfig;

  constructor(initialConfig?: QuizConfigInput) {
    const parsed = QuizConfigSchema.safeParse(initialConfig ?? {});
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error).join(', ')}`);
    }
    this.config = parsed.data;
  }

  /**
   * Get the full configuration
   */
  getConfig(): Readonly<QuizConfig> {
    return Object.freeze({ ...this.config });
  }

  /**
   * Get a specific configuration section
   */
  get<K extends keyof QuizConfig>(key: K): QuizConfig[K] {
    return this.config[key];
  }

  /**
   * Update configuration. Sections are merged one level deep.
   */
  update(updates: QuizConfigInput): void {
    const merged = {
      quiz: { ...this.config.quiz, ...updates.quiz },
      images: { ...this.config.images, ...updates.images },
      paths: { ...this.config.paths, ...updates.paths },
      logging: { ...this.config.logging, ...updates.logging },
      ui: { ...this.config.ui, ...updates.ui },
    };
    const parsed = QuizConfigSchema.safeParse(merged);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error).join(', ')}`);
    }
    this.config = parsed.data;
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const parsed = QuizConfigSchema.safeParse(this.config);
    if (parsed.success) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: formatIssues(parsed.error) };
  }

  /**
   * Load configuration from environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, base: QuizConfigInput = {}): ConfigManager {
    const manager = new ConfigManager(base);
    manager.update(envOverrides(env));
    return manager;
  }

  /**
   * Load configuration from a JSON file, then apply environment overrides
   */
  static async fromFile(path: string, env: NodeJS.ProcessEnv = process.env): Promise<ConfigManager> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read config file ${path}`, {
        path,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = QuizConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration in ${path}: ${formatIssues(parsed.error).join(', ')}`, {
        path,
      });
    }
    return ConfigManager.fromEnv(env, parsed.data);
  }

  /**
   * Export configuration as JSON
   */
  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }
}

function envOverrides(env: NodeJS.ProcessEnv): QuizConfigInput {
  const paths: z.input<typeof PathsConfigSchema> = {};
  const quiz: z.input<typeof QuizSettingsSchema> = {};
  const logging: z.input<typeof LoggingConfigSchema> = {};

  if (env.CAR_PICKER_DATA_DIR) paths.dataDir = env.CAR_PICKER_DATA_DIR;
  if (env.CAR_PICKER_INDEX_DIR) paths.indexDir = env.CAR_PICKER_INDEX_DIR;
  if (env.CAR_PICKER_ASSETS_DIR) paths.assetsDir = env.CAR_PICKER_ASSETS_DIR;
  if (env.CAR_PICKER_DOCS_DIR) paths.docsDir = env.CAR_PICKER_DOCS_DIR;

  if (env.CAR_PICKER_STRICT_SCORING) {
    quiz.strictScoring = !['0', 'false', 'no', 'off'].includes(env.CAR_PICKER_STRICT_SCORING.toLowerCase());
  }

  if (env.CAR_PICKER_LOG_LEVEL) {
    const level = LoggingConfigSchema.shape.level.safeParse(env.CAR_PICKER_LOG_LEVEL);
    if (!level.success) {
      throw new ConfigurationError(`Unknown log level: ${env.CAR_PICKER_LOG_LEVEL}`);
    }
    logging.level = level.data;
  }

  return { paths, quiz, logging };
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}
