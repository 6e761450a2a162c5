/**
 * Shared narrate() for backends that talk to an OpenAI-compatible endpoint
 */

import { BackendUnavailableError } from '@chronicler/core';
import type { BackendKind, ContextDigest, NarrateOptions, StyleHint } from '@chronicler/core';

import type { ChatClient } from '../client/openai-client.js';
import { buildNarrationMessages } from '../prompts/templates.js';

import { toBackendError } from './translate-error.js';
import type { BackendHealth, CheckableBackend } from './types.js';

export interface ChatBackendSettings {
  name: string;
  maxTokensPerSegment: number;
  timeoutMs: number;
  temperature: number;
}

export abstract class ChatBackend implements CheckableBackend {
  abstract readonly kind: BackendKind;
  abstract readonly metered: boolean;
  readonly name: string;
  readonly maxTokensPerSegment: number;
  readonly timeoutMs: number;
  protected readonly temperature: number;

  constructor(settings: ChatBackendSettings) {
    this.name = settings.name;
    this.maxTokensPerSegment = settings.maxTokensPerSegment;
    this.timeoutMs = settings.timeoutMs;
    this.temperature = settings.temperature;
  }

  /**
   * Client to call, or a BackendUnavailableError explaining why there is none
   */
  protected abstract getClient(): ChatClient;

  abstract healthCheck(signal?: AbortSignal): Promise<BackendHealth>;

  abstract resetForNewRun(): void;

  async narrate(
    segmentText: string,
    context: ContextDigest,
    style: StyleHint,
    options: NarrateOptions = {},
  ): Promise<string> {
    const client = this.getClient();

    let content: string;
    let finishReason: string;
    try {
      const response = await client.chat({
        messages: buildNarrationMessages(segmentText, context, style),
        temperature: this.temperature,
        // Narration runs about as long as the segment it retells
        maxTokens: this.maxTokensPerSegment,
        ...(options.signal ? { signal: options.signal } : {}),
      });
      content = response.content.trim();
      finishReason = response.finishReason;
    } catch (error) {
      throw toBackendError(this.name, error);
    }

    if (finishReason === 'content_filter') {
      throw new BackendUnavailableError(this.name, 'invalid_response', 'response blocked by content filter');
    }
    if (!content) {
      throw new BackendUnavailableError(this.name, 'invalid_response', 'empty response');
    }
    return content;
  }
}
