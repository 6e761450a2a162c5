/**
 * Tests for the chat client's retry, error mapping and circuit handling
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { ChatClient, type ChatClientConfig } from '../client/openai-client.js';
import {
  AuthenticationError,
  CircuitOpenError,
  LLMErrorCode,
  QuotaExhaustedError,
  TimeoutError,
} from '../errors.js';

import {
  MockAPIConnectionTimeoutError,
  MockAPIError,
  completion,
  openaiMock,
  resetOpenAIMock,
} from './mocks/mock-openai.js';

vi.mock('openai', async () => (await import('./mocks/mock-openai.js')).createMockOpenAIModule());

const messages = [{ role: 'user' as const, content: 'Tell it.' }];

function createClient(overrides: Partial<ChatClientConfig> = {}): ChatClient {
  return new ChatClient({
    apiKey: 'test-api-key',
    model: 'gpt-4o-mini',
    temperature: 0.7,
    timeoutMs: 1000,
    retry: { maxRetries: 2, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 },
    circuitBreaker: { failureThreshold: 5, successThreshold: 1, resetTimeoutMs: 60_000 },
    onWarning: vi.fn(),
    ...overrides,
  });
}

describe('ChatClient', () => {
  beforeEach(() => {
    resetOpenAIMock();
  });

  it('should hand the SDK its own timeout and no retries of its own', () => {
    createClient({ baseUrl: 'http://localhost:11434/v1' });

    expect(openaiMock.constructed).toEqual([
      { apiKey: 'test-api-key', timeout: 1000, maxRetries: 0, baseURL: 'http://localhost:11434/v1' },
    ]);
  });

  it('should send the request and return content with usage', async () => {
    openaiMock.create.mockResolvedValue(completion('The gate fell.'));
    const client = createClient();

    const response = await client.chat({ messages, maxTokens: 300 });

    expect(response).toEqual({
      content: 'The gate fell.',
      finishReason: 'stop',
      usage: { promptTokens: 40, completionTokens: 10, totalTokens: 50 },
    });
    expect(openaiMock.create).toHaveBeenCalledWith(
      { model: 'gpt-4o-mini', messages, temperature: 0.7, max_tokens: 300 },
      undefined,
    );
    expect(client.getTokenUsage().totalTokens).toBe(50);
  });

  it('should map finish reasons', async () => {
    openaiMock.create.mockResolvedValue(completion('', 'content_filter'));

    const response = await createClient().chat({ messages });

    expect(response.finishReason).toBe('content_filter');
  });

  it('should reject a response without choices', async () => {
    openaiMock.create.mockResolvedValue({ choices: [] });

    await expect(createClient().chat({ messages })).rejects.toMatchObject({
      code: LLMErrorCode.INVALID_RESPONSE,
    });
    expect(openaiMock.create).toHaveBeenCalledTimes(1);
  });

  it('should retry server errors and warn each time', async () => {
    openaiMock.create
      .mockRejectedValueOnce(new MockAPIError(503, 'overloaded'))
      .mockResolvedValueOnce(completion('Second try.'));
    const onWarning = vi.fn();

    const response = await createClient({ onWarning }).chat({ messages });

    expect(response.content).toBe('Second try.');
    expect(openaiMock.create).toHaveBeenCalledTimes(2);
    expect(onWarning).toHaveBeenCalledWith('overloaded (attempt 1/3), retrying in 0ms');
  });

  it('should retry rate limits', async () => {
    openaiMock.create
      .mockRejectedValueOnce(new MockAPIError(429, 'slow down', 'rate_limit_exceeded', { 'retry-after': '0' }))
      .mockResolvedValueOnce(completion('Done.'));

    const response = await createClient().chat({ messages });

    expect(response.content).toBe('Done.');
  });

  it('should not retry authentication failures', async () => {
    openaiMock.create.mockRejectedValue(new MockAPIError(401, 'bad key'));

    await expect(createClient().chat({ messages })).rejects.toBeInstanceOf(AuthenticationError);
    expect(openaiMock.create).toHaveBeenCalledTimes(1);
  });

  it('should not retry an exhausted quota', async () => {
    openaiMock.create.mockRejectedValue(new MockAPIError(429, 'quota gone', 'insufficient_quota'));

    await expect(createClient().chat({ messages })).rejects.toBeInstanceOf(QuotaExhaustedError);
    expect(openaiMock.create).toHaveBeenCalledTimes(1);
  });

  it('should give up on timeouts after the last retry', async () => {
    openaiMock.create.mockRejectedValue(new MockAPIConnectionTimeoutError());

    await expect(createClient().chat({ messages })).rejects.toBeInstanceOf(TimeoutError);
    expect(openaiMock.create).toHaveBeenCalledTimes(3);
  });

  it('should stop retrying once the signal aborts', async () => {
    const controller = new AbortController();
    openaiMock.create.mockImplementation(() => {
      controller.abort();
      return Promise.reject(new MockAPIError(500, 'server error'));
    });

    await expect(createClient().chat({ messages, signal: controller.signal })).rejects.toMatchObject({
      code: LLMErrorCode.API_ERROR,
    });
    expect(openaiMock.create).toHaveBeenCalledTimes(1);
  });

  it('should open the circuit after repeated failed calls', async () => {
    openaiMock.create.mockRejectedValue(new MockAPIError(500, 'server error'));
    const onWarning = vi.fn();
    const client = createClient({
      onWarning,
      retry: { maxRetries: 0, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 },
      circuitBreaker: { failureThreshold: 2, successThreshold: 1, resetTimeoutMs: 60_000 },
    });

    await expect(client.chat({ messages })).rejects.toThrow('server error');
    await expect(client.chat({ messages })).rejects.toThrow('server error');
    await expect(client.chat({ messages })).rejects.toBeInstanceOf(CircuitOpenError);

    expect(openaiMock.create).toHaveBeenCalledTimes(2);
    expect(onWarning).toHaveBeenCalledWith('Circuit for gpt-4o-mini moved from closed to open');
    expect(client.getHealthStatus()).toMatchObject({
      healthy: false,
      circuitState: 'open',
      lastError: 'server error',
    });
  });

  it('should list the served models', async () => {
    openaiMock.listModels.mockReturnValue([{ id: 'gpt-4o' }, { id: 'gpt-4o-mini' }]);

    await expect(createClient().listModels()).resolves.toEqual(['gpt-4o', 'gpt-4o-mini']);
  });
});
