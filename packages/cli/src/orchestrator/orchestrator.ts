/**
 * Runs the synthesis pipeline with the CLI's configuration and reporter
 */

import { type CampaignContext, type SynthesisResult, synthesize } from '@chronicler/core';

import type { ChroniclerConfig } from '../config/schema.js';
import { BackendError, CliError, EXIT_CODES, InputError } from '../errors/index.js';
import type { ProgressReporter } from '../progress/reporter.js';

import type { Services } from './services.js';

/**
 * Campaign context from config, with empty fields left out
 */
export function toCampaignContext(config: ChroniclerConfig): CampaignContext | undefined {
  const { sessionName, setting, party, previousEvents, campaignNotes } = config.campaign;
  const context: CampaignContext = {
    ...(sessionName !== undefined ? { sessionName } : {}),
    ...(setting !== undefined ? { setting } : {}),
    ...(party.length > 0 ? { party: [...party] } : {}),
    ...(previousEvents.length > 0 ? { previousEvents: [...previousEvents] } : {}),
    ...(campaignNotes !== undefined ? { campaignNotes } : {}),
  };
  return Object.keys(context).length > 0 ? context : undefined;
}

/**
 * Weave one transcript into a story
 *
 * Unsuccessful runs come back as results; see failureToError. Backends
 * start each run from a closed circuit, so services can be reused.
 */
export async function orchestrateSynthesis(
  transcript: string,
  config: ChroniclerConfig,
  services: Services,
  reporter: ProgressReporter,
  signal?: AbortSignal,
): Promise<SynthesisResult> {
  const { pipeline } = config;
  const backends = services.registry.resolve(pipeline.backends);
  services.registry.resetForNewRun();
  const campaign = toCampaignContext(config);

  reporter.startRun();
  try {
    return await synthesize(transcript, backends, {
      quota: services.quota,
      onProgress: reporter.onProgress,
      onWarning: reporter.onWarning,
      minBoundaryDistance: pipeline.minBoundaryDistance,
      contextShare: pipeline.contextShare,
      memory: { summaryMaxChars: pipeline.summaryMaxChars },
      synthesizer: { closingPlotThreads: pipeline.closingPlotThreads },
      ...(pipeline.segmentTokenBudget !== undefined ? { segmentTokenBudget: pipeline.segmentTokenBudget } : {}),
      ...(campaign ? { campaign } : {}),
      ...(signal ? { signal } : {}),
    });
  } finally {
    reporter.stop();
  }
}

/**
 * CLI error for an unsuccessful run, or null when it succeeded
 */
export function failureToError(result: SynthesisResult): CliError | null {
  const message = result.failureMessage ?? 'Synthesis failed';
  switch (result.failureReason) {
    case undefined:
      return null;
    case 'SEGMENTATION_ERROR':
      return new InputError(message, 'Check that the transcript has text in it');
    case 'ALL_BACKENDS_EXHAUSTED': {
      const last = result.failoverEvents[result.failoverEvents.length - 1];
      return new BackendError(
        last?.from ?? 'all',
        message,
        'Add the offline backend to --backends so a run can always finish',
      );
    }
    case 'CANCELLED':
      return new CliError(message, undefined, EXIT_CODES.cancelled);
  }
}
