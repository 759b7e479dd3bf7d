/**
 * car-picker - "guess the car" quiz engine over a directory of car photos
 *
 * @packageDocumentation
 */

export * from './core/errors.js';
export * from './core/types.js';
export * from './core/QuizConfig.js';

export * from './index/text.js';
export * from './index/Lexicon.js';
export * from './index/filename.js';
export * from './index/IndexCache.js';
export * from './index/IndexBuilder.js';

export * from './quiz/RoundGenerator.js';
export * from './quiz/scoring.js';

export * from './session/SessionTracker.js';

export * from './media/thumbnail.js';

export * from './utils/random.js';
export * from './utils/BoundedHistory.js';
export { createLogger, createSilentLogger, type Logger, type LoggerOptions } from './utils/logger.js';

export * from './QuizEngine.js';

export { QuizEngine as default } from './QuizEngine.js';
