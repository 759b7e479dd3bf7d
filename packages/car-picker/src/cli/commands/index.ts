/**
 * CLI Commands Index
 */

export { createIndexCommand } from './build-index.js';
export { createPlayCommand, runPlay, type PlayIO, type PlayOptions, type PlaySummary } from './play.js';
export { createDoctorCommand, runDoctor } from './doctor.js';
export { createLexiconCommand } from './lexicon.js';
