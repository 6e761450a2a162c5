/**
 * Progress module exports
 */

export { ProgressReporter, type ProgressReporterOptions } from './reporter.js';
export { TimeEstimator } from './time-estimator.js';
export { PHASE_NAMES } from './types.js';
export { formatConfigDisplay, formatDuration, formatEta, formatPercentage } from './formatters.js';
