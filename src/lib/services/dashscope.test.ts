import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DashScopeService, extractProviderMessage } from './dashscope';
import { ExternalServiceError } from '@/lib/utils/errors';

// --- MOCKS ---

const fetchMock = vi.fn();
vi.stubGlobal('fetch', fetchMock);

describe('DashScopeService', () => {
  let service: DashScopeService;
  const API_KEY = 'test-api-key';
  const BASE_URL = 'https://llm.example.test/compatible-mode/';

  beforeEach(() => {
    service = new DashScopeService(API_KEY, BASE_URL, 'review-model');
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.resetAllMocks();
  });

  it('should expose its name and model', () => {
    expect(service.getName()).toBe('DashScopeService');
    expect(service.getModel()).toBe('review-model');
  });

  it('should build the chat completion request', async () => {
    fetchMock.mockResolvedValueOnce({
      ok: true,
      json: async () => ({
        choices: [{ message: { content: '1. Profitdoubled 【❌ Suspect】' } }],
      }),
    });

    const result = await service.generate('Review these items', {
      systemPrompt: 'You are a reviewer.',
      temperature: 0.1,
      maxTokens: 2000,
    });

    expect(result.content).toBe('1. Profitdoubled 【❌ Suspect】');

    // Trailing slash of the base URL is dropped
    expect(fetchMock).toHaveBeenCalledWith(
      'https://llm.example.test/compatible-mode/v1/chat/completions',
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${API_KEY}`,
        },
      })
    );

    const callBody = JSON.parse(fetchMock.mock.calls[0][1].body);
    expect(callBody).toEqual({
      model: 'review-model',
      messages: [
        { role: 'system', content: 'You are a reviewer.' },
        { role: 'user', content: 'Review these items' },
      ],
      temperature: 0.1,
      max_tokens: 2000,
    });
  });

  it('should strip reasoning blocks and read token usage', async () => {
    fetchMock.mockResolvedValueOnce({
      ok: true,
      json: async () => ({
        choices: [{ message: { content: '<think>checking the facts</think>\nAll items pass.' } }],
        usage: { prompt_tokens: 120, completion_tokens: 8, total_tokens: 128 },
      }),
    });

    const result = await service.generate('prompt');

    expect(result).toEqual({
      content: 'All items pass.',
      tokenUsage: { prompt: 120, completion: 8, total: 128 },
    });
    const callBody = JSON.parse(fetchMock.mock.calls[0][1].body);
    expect(callBody.messages).toEqual([{ role: 'user', content: 'prompt' }]);
    expect(callBody).not.toHaveProperty('max_tokens');
  });

  it('should surface status and provider message on API errors', async () => {
    fetchMock.mockResolvedValueOnce({
      ok: false,
      status: 401,
      text: async () => JSON.stringify({ error: { message: 'Invalid API-key provided.', code: 'invalid_api_key' } }),
    });

    const error = await service.generate('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({
      status: 401,
      providerMessage: 'Invalid API-key provided.',
      message: 'DashScope: HTTP 401: Invalid API-key provided.',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should reject a response without choices', async () => {
    fetchMock.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ choices: [] }),
    });

    await expect(service.generate('prompt')).rejects.toThrow('DashScope: Response has no choices');
  });
});

describe('extractProviderMessage', () => {
  it('should read OpenAI-style and native error bodies', () => {
    expect(extractProviderMessage('{"error":{"message":"Rate limit reached"}}')).toBe('Rate limit reached');
    expect(extractProviderMessage('{"code":"Throttling","message":"Requests throttled"}')).toBe('Requests throttled');
  });

  it('should fall back to the raw body', () => {
    expect(extractProviderMessage('  Internal Server Error\n')).toBe('Internal Server Error');
  });
});
