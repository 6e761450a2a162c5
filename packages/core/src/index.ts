/**
 * @chronicler/core - Story synthesis engine for tabletop session transcripts
 *
 * This package contains the synthesis pipeline including:
 * - Boundary detection and budget-aware segmentation
 * - Heuristic element extraction
 * - Session memory with a compacted running summary
 * - Sequential narration with backend failover
 * - Story assembly and completeness scoring
 */

export const VERSION = '0.1.0';

// Re-export types
export * from './types/index.js';

// Re-export errors
export * from './errors.js';

// Re-export segmentation
export * from './segmentation/index.js';

// Re-export extraction
export * from './extraction/index.js';

// Re-export memory
export * from './memory/index.js';

// Re-export synthesis
export * from './synthesis/index.js';

// Re-export pipeline
export * from './pipeline/index.js';
