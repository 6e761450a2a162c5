/**
 * Orchestrator tests against the in-process offline backend
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { ChroniclerConfig } from '../config/schema.js';
import { BackendError, EXIT_CODES, InputError } from '../errors/cli-errors.js';
import { failureToError, orchestrateSynthesis, toCampaignContext } from '../orchestrator/orchestrator.js';
import { initializeServices, performHealthChecks, requireUsableBackend } from '../orchestrator/services.js';
import { formatStory, storyFormatOptions } from '../output/story-formatter.js';
import { ProgressReporter } from '../progress/reporter.js';

function configWith(backends: string[], overrides: Partial<ChroniclerConfig> = {}): ChroniclerConfig {
  return {
    ...DEFAULT_CONFIG,
    pipeline: { ...DEFAULT_CONFIG.pipeline, backends },
    ...overrides,
  };
}

const TRANSCRIPT = 'Kael found a hidden door in Ironhold Keep. Mira lit a torch and followed.';

describe('orchestrateSynthesis', () => {
  it('should weave a story with the offline backend', async () => {
    const config = configWith(['offline']);
    const services = initializeServices(config);

    const result = await orchestrateSynthesis(TRANSCRIPT, config, services, new ProgressReporter({ silent: true }));

    expect(result.success).toBe(true);
    expect(result.narrations.map((narration) => narration.backend)).toEqual(['offline']);
    expect(result.storyText).toContain('Kael');
    expect(failureToError(result)).toBeNull();
  });

  it('should report a keyless remote-only run as a backend error', async () => {
    const config = configWith(['remote']);
    const services = initializeServices(config);

    const result = await orchestrateSynthesis(TRANSCRIPT, config, services, new ProgressReporter({ silent: true }));
    const error = failureToError(result);

    expect(result.failureReason).toBe('ALL_BACKENDS_EXHAUSTED');
    expect(error).toBeInstanceOf(BackendError);
    expect(error?.exitCode).toBe(EXIT_CODES.backend);
    if (error instanceof BackendError) {
      expect(error.backendName).toBe('remote');
    }
  });

  it('should report an empty transcript as an input error', async () => {
    const config = configWith(['offline']);
    const services = initializeServices(config);

    const result = await orchestrateSynthesis('', config, services, new ProgressReporter({ silent: true }));
    const error = failureToError(result);

    expect(error).toBeInstanceOf(InputError);
    expect(error?.message).toBe('Transcript is empty');
  });

  it('should report a cancelled run with exit code 130', async () => {
    const config = configWith(['offline']);
    const services = initializeServices(config);
    const controller = new AbortController();
    controller.abort();

    const result = await orchestrateSynthesis(
      TRANSCRIPT,
      config,
      services,
      new ProgressReporter({ silent: true }),
      controller.signal,
    );

    expect(result.failureReason).toBe('CANCELLED');
    expect(failureToError(result)?.exitCode).toBe(130);
    expect(failureToError(result)?.message).toBe('Run cancelled after 0 segment(s)');
  });

  it('should collect pipeline warnings through the reporter', async () => {
    const lines: string[] = [];
    const config = configWith(['remote', 'offline']);
    const reporter = new ProgressReporter({ silent: false, color: false, write: (line) => lines.push(line) });
    const services = initializeServices(config, { onWarning: reporter.onWarning });

    const result = await orchestrateSynthesis(TRANSCRIPT, config, services, reporter);

    expect(result.failoverEvents).toHaveLength(1);
    expect(result.warnings.length).toBeGreaterThan(0);
    expect(lines.filter((line) => line.startsWith('  ⚠ '))).toHaveLength(result.warnings.length);
  });

  it('should write the session name as a single heading', async () => {
    const config = configWith(['offline'], {
      campaign: { ...DEFAULT_CONFIG.campaign, sessionName: 'The Drowned Bell' },
    });
    const services = initializeServices(config);

    const result = await orchestrateSynthesis(TRANSCRIPT, config, services, new ProgressReporter({ silent: true }));
    const output = formatStory(result, storyFormatOptions(config));

    expect(output.split('\n')[0]).toBe('# The Drowned Bell');
    expect(output.match(/^# The Drowned Bell$/gm)).toHaveLength(1);
  });
});

describe('services', () => {
  it('should health-check only the listed backends', async () => {
    const config = configWith(['offline']);
    const health = await performHealthChecks(config, initializeServices(config));

    expect(health).toHaveLength(1);
    expect(health[0]).toMatchObject({ name: 'offline', kind: 'offline', healthy: true });
  });

  it('should cap remote tokens through the quota authority', () => {
    const config = configWith(['remote'], { remote: { ...DEFAULT_CONFIG.remote, tokenQuota: 1000 } });
    const { quota } = initializeServices(config);

    expect(quota.estimateAndReserve('remote', 800)).toBe(true);
    expect(quota.estimateAndReserve('remote', 300)).toBe(false);
    expect(quota.remaining('remote')).toBe(200);
  });

  it('should fail fast when no listed backend is healthy', () => {
    expect(() => requireUsableBackend([{ name: 'remote', kind: 'remote', healthy: false, detail: 'no API key' }])).toThrow(
      BackendError,
    );
    expect(() =>
      requireUsableBackend([
        { name: 'remote', kind: 'remote', healthy: false, detail: 'no API key' },
        { name: 'offline', kind: 'offline', healthy: true, detail: 'template narration' },
      ]),
    ).not.toThrow();
  });
});

describe('toCampaignContext', () => {
  it('should leave out empty fields', () => {
    expect(toCampaignContext(DEFAULT_CONFIG)).toBeUndefined();
    expect(
      toCampaignContext({
        ...DEFAULT_CONFIG,
        campaign: { ...DEFAULT_CONFIG.campaign, setting: 'The Shattered Coast', party: ['Kael'] },
      }),
    ).toEqual({ setting: 'The Shattered Coast', party: ['Kael'] });
  });
});

describe('ProgressReporter summary', () => {
  it('should print run totals', async () => {
    const lines: string[] = [];
    const config = configWith(['offline']);
    const reporter = new ProgressReporter({ color: false, silent: true });
    const result = await orchestrateSynthesis(TRANSCRIPT, config, initializeServices(config), reporter);

    const printer = new ProgressReporter({ color: false, write: (line) => lines.push(line) });
    printer.printSummary(result);

    expect(lines).toContain('  Segments: 1/1');
    expect(lines).toContain('  Failovers: 0');
    expect(lines).toContain(`  Words: ${result.wordCount}`);
  });
});
