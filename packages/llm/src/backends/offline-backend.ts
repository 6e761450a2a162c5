/**
 * Offline backend: deterministic template narration, no model
 *
 * Retells a segment from what the heuristic extractor finds in it: the
 * places, the people, then every event sentence in order. Always available,
 * so it is the usual last entry in a preference list.
 */

import { extractElements, splitSentences } from '@chronicler/core';
import type { ContextDigest, NarrateOptions, StyleHint } from '@chronicler/core';

import { createOfflineConfig } from '../config/llm-config.js';
import type { OfflineBackendConfig } from '../config/llm-config.js';

import type { BackendHealth, CheckableBackend } from './types.js';

/**
 * Sentences taken from the segment when it has no events
 */
const QUIET_SEGMENT_SENTENCES = 2;

function formatList(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1] ?? ''}`;
}

function endSentence(text: string): string {
  const trimmed = text.trim();
  return /[.!?…"'”’]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}

/**
 * Speaker tags and markdown removed, whitespace collapsed
 */
function plainSentence(sentence: string): string {
  return sentence
    .replace(/^[ \t]*(?:#+|\*\*[^*\n]+\*\*[ \t]*:|[\p{Lu}][\p{L}'’-]*[ \t]*:)[ \t]*/u, '')
    .replace(/\*\*/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export class OfflineBackend implements CheckableBackend {
  readonly kind = 'offline' as const;
  readonly metered = false;
  readonly name: string;
  readonly maxTokensPerSegment: number;
  readonly timeoutMs: number;

  constructor(config: Partial<OfflineBackendConfig> = {}) {
    const resolved = createOfflineConfig(config);
    this.name = resolved.name;
    this.maxTokensPerSegment = resolved.maxTokensPerSegment;
    this.timeoutMs = resolved.timeoutMs;
  }

  /** Nothing to reset: templates keep no state */
  resetForNewRun(): void {}

  narrate(
    segmentText: string,
    context: ContextDigest,
    style: StyleHint,
    _options?: NarrateOptions,
  ): Promise<string> {
    return Promise.resolve(this.compose(segmentText, context, style));
  }

  /**
   * Same input, same text
   */
  compose(segmentText: string, context: ContextDigest, style: StyleHint): string {
    const elements = extractElements(segmentText, context.segmentIndex);
    const sentences: string[] = [];

    if (style === 'opening') {
      const setting = context.campaign?.setting;
      sentences.push(setting ? `The tale begins in ${setting}.` : 'The tale begins.');
    }

    if (elements.locations.length > 0) {
      sentences.push(`The story turns to ${formatList(elements.locations)}.`);
    }

    const newcomers = elements.characters.filter(
      (name) => !context.characters.some((known) => known.toLowerCase() === name.toLowerCase()),
    );
    const returning = elements.characters.filter((name) => !newcomers.includes(name));
    if (returning.length > 0) {
      sentences.push(`${formatList(returning)} ${returning.length === 1 ? 'is' : 'are'} still at the heart of it.`);
    }
    if (newcomers.length > 0) {
      sentences.push(`${formatList(newcomers)} ${newcomers.length === 1 ? 'enters' : 'enter'} the tale.`);
    }

    const events = elements.events.map((event) => endSentence(plainSentence(event.text))).filter(Boolean);
    if (events.length > 0) {
      sentences.push(...events);
    } else {
      const quiet = splitSentences(segmentText)
        .map(plainSentence)
        .filter((sentence) => sentence.length > 0)
        .slice(0, QUIET_SEGMENT_SENTENCES)
        .map(endSentence);
      sentences.push(...(quiet.length > 0 ? quiet : ['Time passed quietly.']));
    }

    if (style === 'closing') {
      sentences.push('And there the session came to rest.');
    }

    return sentences.join(' ');
  }

  healthCheck(): Promise<BackendHealth> {
    return Promise.resolve({ name: this.name, kind: this.kind, healthy: true, detail: 'template narration' });
  }
}
