/**
 * Shared types for progress reporter components
 */

import type { RunState } from '@chronicler/core';

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<RunState, string> = {
  idle: 'Waiting',
  segmenting: 'Segmenting transcript',
  narrating: 'Narrating segments',
  failover: 'Switching backend',
  synthesizing: 'Weaving the story',
  complete: 'Complete',
  failed: 'Failed',
  cancelled: 'Cancelled',
};
