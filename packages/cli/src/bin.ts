#!/usr/bin/env node

/**
 * Chronicler CLI - session transcripts to stories
 *
 * Main entry point for the chronicler command-line interface.
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  try {
    const program = createProgram();
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error);
  }
}

// Run if executed directly
main().catch(handleError);
