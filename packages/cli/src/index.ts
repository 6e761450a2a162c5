/**
 * @chronicler/cli - command-line interface for weaving session transcripts
 */

export { VERSION, createProgram, parseCliOptions } from './cli.js';
export { weaveCommand, readInput, writeOutput } from './commands/weave.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './orchestrator/index.js';
export * from './output/index.js';
export * from './progress/index.js';
