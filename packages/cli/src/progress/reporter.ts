/**
 * Progress reporter with ora spinners
 *
 * Writes to stderr so that a story sent to stdout can be piped.
 */

import type { RunProgress, RunState, SynthesisResult } from '@chronicler/core';
import type { BackendHealth } from '@chronicler/llm';
import chalk from 'chalk';
import ora, { type Ora, type Color } from 'ora';

import { formatDuration, formatEta, formatPercentage } from './formatters.js';
import { TimeEstimator } from './time-estimator.js';
import { type ColorFunctions, PHASE_NAMES } from './types.js';

export type { ColorFunctions } from './types.js';

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print each finished segment and every backend notice (default: false) */
  verbose?: boolean;
  /** Line sink (default: console.error) */
  write?: (line: string) => void;
}

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private phaseStartTime: number = 0;
  private phase: RunState | null = null;
  private lastSegment = -1;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;
  private readonly timeEstimator = new TimeEstimator();
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line: string) => console.error(line));
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    this.write(this.c.bold(`Chronicler v${version}`));
    this.write('');
  }

  /**
   * Report backend health check results
   */
  reportBackendHealth(backends: readonly BackendHealth[]): void {
    if (this.silent) return;

    this.write(this.c.dim('Checking backends...'));
    for (const backend of backends) {
      const status = backend.healthy ? this.c.green('✓') : this.c.red('✗');
      const detail = backend.healthy ? this.c.dim(` - ${backend.detail}`) : this.c.red(` (${backend.detail})`);
      this.write(`  ${status} ${backend.name} [${backend.kind}]${detail}`);
    }
    this.write('');
  }

  /**
   * Start the overall run
   */
  startRun(): void {
    this.startTime = Date.now();
    this.phase = null;
    this.lastSegment = -1;
    this.timeEstimator.reset();
  }

  /**
   * Progress callback for the pipeline
   */
  readonly onProgress = (progress: RunProgress): void => {
    if (this.silent) return;

    if (progress.state !== this.phase) {
      this.enterPhase(progress);
    }

    if (progress.state === 'narrating') {
      this.updateNarration(progress);
    }
  };

  /**
   * Warning callback for the pipeline (failovers, extraction problems)
   */
  readonly onWarning = (message: string): void => {
    this.warnSafe(message);
  };

  /**
   * Retry and circuit notices from model clients, shown only in verbose mode
   */
  readonly onBackendNotice = (message: string): void => {
    if (!this.verbose) return;
    this.warnSafe(message);
  };

  private enterPhase(progress: RunProgress): void {
    const previous = this.phase;
    this.phase = progress.state;

    if (previous !== null) {
      this.finishPhase(previous, progress);
    }

    switch (progress.state) {
      case 'complete':
      case 'failed':
      case 'cancelled':
        return;
      default:
        this.startSpinner(PHASE_NAMES[progress.state]);
    }
  }

  private finishPhase(phase: RunState, next: RunProgress): void {
    // A failover interrupts narration without ending it
    if ((phase === 'narrating' && next.state === 'failover') || phase === 'failover') return;

    const duration = Date.now() - this.phaseStartTime;
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detail = phase === 'segmenting' && next.totalSegments > 0 ? this.c.dim(`: ${next.totalSegments} segments`) : '';

    if (next.state === 'failed' || next.state === 'cancelled') {
      const line = `${PHASE_NAMES[phase]}: ${PHASE_NAMES[next.state].toLowerCase()}${durationStr}`;
      if (this.spinner) {
        this.spinner.fail(line);
        this.spinner = null;
      } else {
        this.write(`  ${this.c.red('✗')} ${line}`);
      }
      return;
    }

    if (this.spinner) {
      this.spinner.succeed(`${PHASE_NAMES[phase]}${detail}${durationStr}`);
      this.spinner = null;
    }
  }

  private updateNarration(progress: RunProgress): void {
    if (!this.spinner) {
      this.startSpinner(PHASE_NAMES.narrating);
    }
    if (progress.segmentIndex > this.lastSegment) {
      this.timeEstimator.record(progress.segmentIndex);
      if (this.verbose && this.lastSegment >= 0 && progress.segmentIndex <= progress.totalSegments) {
        this.printAboveSpinner(this.c.dim(`  segment ${progress.segmentIndex}/${progress.totalSegments} done`));
      }
      this.lastSegment = progress.segmentIndex;
    }
    if (progress.segmentIndex >= progress.totalSegments || !this.spinner) return;

    const etaMs = this.timeEstimator.estimateRemaining(progress.segmentIndex, progress.totalSegments);
    const etaStr = etaMs !== null ? this.c.dim(` (${formatEta(etaMs)} remaining)`) : '';
    const via = progress.backend ? ` via ${this.c.cyan(progress.backend)}` : '';
    this.spinner.text = `Narrating segment ${progress.segmentIndex + 1}/${progress.totalSegments}${via}${etaStr}`;
  }

  private startSpinner(text: string): void {
    this.stopSpinner();
    this.phaseStartTime = Date.now();

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  private stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  private printAboveSpinner(line: string): void {
    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      this.write(line);
      this.spinner.start(currentText);
    } else {
      this.write(line);
    }
  }

  /**
   * Print the final summary
   */
  printSummary(result: SynthesisResult): void {
    if (this.silent) return;

    const totalTime = this.startTime > 0 ? Date.now() - this.startTime : result.processingTimeSeconds * 1000;

    this.write('');
    this.write(this.c.bold('Summary:'));
    this.write(`  Segments: ${result.segmentsProcessed}/${result.totalSegments}`);
    this.write(`  Completeness: ${formatPercentage(result.completenessScore)}`);
    this.write(`  Failovers: ${result.failoverEvents.length}`);
    this.write(`  Words: ${result.wordCount}`);
    this.write(`  Total time: ${formatDuration(totalTime)}`);
    if (result.characters.length > 0) {
      this.write(`  Characters: ${result.characters.join(', ')}`);
    }
    if (!result.success && result.failureMessage) {
      this.write(this.c.red(`  Stopped: ${result.failureMessage}`));
    }
  }

  /**
   * Print estimated spend of the hosted model
   */
  printCostSummary(costs: { model: string; reservedTokens: number; estimatedCost: string }): void {
    if (this.silent) return;

    this.write('');
    this.write(this.c.bold('Remote usage:'));
    this.write(`  Model: ${costs.model}`);
    this.write(`  Reserved tokens: ${costs.reservedTokens.toLocaleString('en-US')}`);
    this.write(`  ${this.c.bold('Estimated cost:')} ${costs.estimatedCost}`);
  }

  /**
   * Print output file location
   */
  printOutputLocation(outputPath: string): void {
    if (this.silent) return;
    this.write('');
    this.write(`Output written to: ${this.c.cyan(outputPath)}`);
  }

  /**
   * Print a message (respects color and silent settings)
   */
  printMessage(message: string): void {
    if (this.silent) return;
    this.write(message);
  }

  printSuccess(message: string): void {
    if (this.silent) return;
    this.write(this.c.green(`✓ ${message}`));
  }

  printWarning(message: string): void {
    if (this.silent) return;
    this.write(this.c.yellow(`⚠ ${message}`));
  }

  printError(message: string): void {
    if (this.silent) return;
    this.write(this.c.red(`✗ ${message}`));
  }

  /**
   * Print a warning without breaking an active spinner line
   */
  warnSafe(message: string): void {
    if (this.silent) return;
    this.printAboveSpinner(this.c.yellow(`  ⚠ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    this.stopSpinner();
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  hasColors(): boolean {
    return this.useColor;
  }
}
