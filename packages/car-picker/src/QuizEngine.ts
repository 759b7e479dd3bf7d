/**
 * QuizEngine - ties the index, round generation, scoring and sessions
 * together for a presentation layer (the CLI, or any other front end).
 *
 * The index and lexicon are loaded once and shared read-only; every player
 * gets an isolated SessionState keyed by session id.
 */

import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';

import { ConfigManager, type QuizConfig, type QuizConfigInput } from './core/QuizConfig.js';
import { IndexNotLoadedError, InvalidChoiceError, SessionError } from './core/errors.js';
import type {
  CarRecord,
  Evaluation,
  HistoryEntry,
  IndexBuildResult,
  Round,
  SessionStats,
} from './core/types.js';
import { buildIndex } from './index/IndexBuilder.js';
import { ensureLexicon, saveLexicon, type Lexicon } from './index/Lexicon.js';
import { ensureThumbnail } from './media/thumbnail.js';
import { generateRound, representativesByKey } from './quiz/RoundGenerator.js';
import { evaluate } from './quiz/scoring.js';
import {
  createSessionState,
  recordOutcome,
  sessionStats,
  type CreateSessionOptions,
  type SessionState,
} from './session/SessionTracker.js';
import { isNotFound } from './utils/fsErrors.js';
import { createLogger } from './utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface QuizEngineOptions {
  config?: QuizConfigInput;
  configManager?: ConfigManager;
  logger?: Logger;
  /** Relative paths in the config resolve against this directory */
  baseDir?: string;
  now?: () => Date;
}

export interface AnswerResult {
  evaluation: Evaluation;
  chosen: CarRecord;
  target: CarRecord;
  entry: HistoryEntry;
  stats: SessionStats;
}

export type HealthStatus = 'ok' | 'degraded';

export interface HealthCheck {
  name: string;
  status: 'pass' | 'fail';
  message: string;
}

export interface HealthReport {
  status: HealthStatus;
  checks: HealthCheck[];
}

export interface QuizEngineEvents {
  'index:ready': (result: IndexBuildResult) => void;
  'session:create': (session: SessionState) => void;
  'session:end': (sessionId: string) => void;
  'round:start': (sessionId: string, round: Round) => void;
  'round:answered': (sessionId: string, result: AnswerResult) => void;
}

export const INDEX_FILE_NAME = 'cars_index.json';
export const LEXICON_FILE_NAME = 'lexicon.json';

// ============================================================================
// QuizEngine
// ============================================================================

export class QuizEngine extends EventEmitter<QuizEngineEvents> {
  private readonly configManager: ConfigManager;
  private readonly logger: Logger;
  private readonly baseDir: string;
  private readonly now: () => Date;

  private lexicon: Lexicon | null = null;
  private index: readonly CarRecord[] | null = null;
  private lastBuild: IndexBuildResult | null = null;
  private sessions: Map<string, SessionState> = new Map();

  constructor(options: QuizEngineOptions = {}) {
    super();

    this.configManager = options.configManager ?? new ConfigManager(options.config);
    const config = this.configManager.getConfig();

    this.logger =
      options.logger ??
      createLogger({ level: config.logging.level, pretty: config.logging.pretty, name: 'car-picker' });
    this.baseDir = options.baseDir ?? process.cwd();
    this.now = options.now ?? (() => new Date());
  }

  get config(): Readonly<QuizConfig> {
    return this.configManager.getConfig();
  }

  // ==========================================================================
  // Paths
  // ==========================================================================

  get dataDir(): string {
    return resolve(this.baseDir, this.config.paths.dataDir);
  }

  get indexPath(): string {
    return resolve(this.baseDir, this.config.paths.indexDir, INDEX_FILE_NAME);
  }

  get lexiconPath(): string {
    return resolve(this.baseDir, this.config.paths.indexDir, LEXICON_FILE_NAME);
  }

  get thumbnailDir(): string {
    return resolve(this.baseDir, this.config.paths.assetsDir, 'thumbnails');
  }

  get docsDir(): string | null {
    const docsDir = this.config.paths.docsDir;
    return docsDir ? resolve(this.baseDir, docsDir) : null;
  }

  // ==========================================================================
  // Index & lexicon
  // ==========================================================================

  /**
   * Load the index from cache, or build it when the data directory or the
   * lexicon changed.
   */
  async loadIndex(options: { force?: boolean } = {}): Promise<IndexBuildResult> {
    const lexicon = this.lexicon ?? (await this.reloadLexicon());
    const result = await buildIndex(this.dataDir, lexicon, {
      cachePath: this.indexPath,
      force: options.force,
      logger: this.logger.child({ component: 'index' }),
    });

    this.index = result.records;
    this.lastBuild = result;
    this.emit('index:ready', result);
    return result;
  }

  /**
   * Re-read the lexicon artifact. Records already in the index keep their
   * names until the next `loadIndex`.
   */
  async reloadLexicon(): Promise<Lexicon> {
    this.lexicon = await ensureLexicon(this.lexiconPath, this.logger.child({ component: 'lexicon' }));
    return this.lexicon;
  }

  async addLexiconAlias(canonical: string, alias: string): Promise<Lexicon> {
    const lexicon = this.lexicon ?? (await this.reloadLexicon());
    lexicon.addAlias(canonical, alias);
    await saveLexicon(this.lexiconPath, lexicon);
    this.logger.info({ canonical, alias }, 'Lexicon alias added');
    return lexicon;
  }

  getIndex(): readonly CarRecord[] {
    if (!this.index) {
      throw new IndexNotLoadedError();
    }
    return this.index;
  }

  getLastBuild(): IndexBuildResult | null {
    return this.lastBuild;
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  createSession(options: Omit<CreateSessionOptions, 'historyLimit'> = {}): SessionState {
    const session = createSessionState({ ...options, historyLimit: this.config.quiz.historySize });
    if (this.sessions.has(session.id)) {
      throw new SessionError(`Session ${session.id} already exists`, { sessionId: session.id });
    }
    this.sessions.set(session.id, session);
    this.logger.debug({ sessionId: session.id, seed: session.rngSeed }, 'Session created');
    this.emit('session:create', session);
    return session;
  }

  getSession(sessionId: string): SessionState {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionError(`Session not found: ${sessionId}`, { sessionId });
    }
    return session;
  }

  endSession(sessionId: string): boolean {
    const deleted = this.sessions.delete(sessionId);
    if (deleted) {
      this.emit('session:end', sessionId);
    }
    return deleted;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  getStats(sessionId: string): SessionStats {
    return sessionStats(this.getSession(sessionId));
  }

  getHistory(sessionId: string): HistoryEntry[] {
    return this.getSession(sessionId).history.toArray();
  }

  // ==========================================================================
  // Rounds
  // ==========================================================================

  /**
   * The session's unanswered round, or a fresh one once it was answered.
   */
  nextRound(sessionId: string): Round {
    const session = this.getSession(sessionId);
    if (session.currentRound && !session.answered) {
      return session.currentRound;
    }

    const round = generateRound(this.getIndex(), session.rng, {
      numChoices: this.config.quiz.numChoices,
      now: this.now,
    });
    session.currentRound = round;
    session.answered = false;

    this.emit('round:start', sessionId, round);
    return round;
  }

  submitAnswer(sessionId: string, imagePath: string): AnswerResult {
    const session = this.getSession(sessionId);
    const round = session.currentRound;
    if (!round) {
      throw new SessionError('No round in progress', { sessionId });
    }
    if (session.answered) {
      throw new SessionError(`Round ${round.id} was already answered`, { sessionId, roundId: round.id });
    }

    const chosen = round.choices.find((choice) => choice.imagePath === imagePath);
    if (!chosen) {
      throw new InvalidChoiceError(`Choice ${imagePath} is not part of round ${round.id}`, {
        roundId: round.id,
        imagePath,
      });
    }

    const evaluation = evaluate(round, chosen, { strictScoring: this.config.quiz.strictScoring });
    const entry = recordOutcome(session, round, { correct: evaluation.correct, chosen }, this.now());
    session.answered = true;

    const result: AnswerResult = {
      evaluation,
      chosen,
      target: round.target,
      entry,
      stats: sessionStats(session),
    };
    this.emit('round:answered', sessionId, result);
    return result;
  }

  async thumbnailFor(record: CarRecord): Promise<string> {
    return ensureThumbnail(join(this.dataDir, record.imagePath), this.thumbnailDir, {
      maxWidth: this.config.images.thumbnailWidth,
    });
  }

  // ==========================================================================
  // Health
  // ==========================================================================

  /**
   * `degraded` when any check fails: the data directory, a playable index,
   * and the pre-built documentation directory when one is configured.
   */
  async getHealth(): Promise<HealthReport> {
    const checks: HealthCheck[] = [];

    checks.push(
      (await isDirectory(this.dataDir))
        ? { name: 'Data directory', status: 'pass', message: this.dataDir }
        : { name: 'Data directory', status: 'fail', message: `Missing: ${this.dataDir}` }
    );

    if (!this.index) {
      checks.push({ name: 'Index', status: 'fail', message: 'Index not loaded' });
    } else {
      const distinct = representativesByKey(this.index).size;
      const required = this.config.quiz.numChoices;
      checks.push(
        distinct >= required
          ? { name: 'Index', status: 'pass', message: `${this.index.length} records, ${distinct} distinct cars` }
          : { name: 'Index', status: 'fail', message: `Not enough data: ${distinct} distinct cars, ${required} required` }
      );
    }

    const docsDir = this.docsDir;
    if (docsDir) {
      checks.push(
        (await hasEntries(docsDir))
          ? { name: 'Documentation site', status: 'pass', message: docsDir }
          : { name: 'Documentation site', status: 'fail', message: `Not built: ${docsDir}` }
      );
    }

    const status: HealthStatus = checks.every((c) => c.status === 'pass') ? 'ok' : 'degraded';
    return { status, checks };
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

async function hasEntries(path: string): Promise<boolean> {
  if (!(await isDirectory(path))) return false;
  return (await readdir(path)).length > 0;
}

/**
 * Create a new QuizEngine instance
 */
export function createQuizEngine(options?: QuizEngineOptions): QuizEngine {
  return new QuizEngine(options);
}
