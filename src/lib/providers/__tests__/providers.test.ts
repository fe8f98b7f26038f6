import { describe, it, expect, vi } from 'vitest';
import type { EnvironmentConfig } from '../../env-config.js';
import { ProviderError } from '../../errors.js';

const { mockOpenAI, mockAnthropic } = vi.hoisted(() => {
  return {
    mockOpenAI: {
      constructed: vi.fn(),
      create: vi.fn(),
    },
    mockAnthropic: {
      constructed: vi.fn(),
      create: vi.fn(),
    },
  };
});

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mockOpenAI.create } };

    constructor(options: unknown) {
      mockOpenAI.constructed(options);
    }
  },
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mockAnthropic.create };

    constructor(options: unknown) {
      mockAnthropic.constructed(options);
    }
  },
}));

import {
  AnthropicTranslationProvider,
  OpenAITranslationProvider,
  createTranslationProvider,
} from '../index.js';

const prompt = { system: 'translate things', user: 'Message:\nHello' };

const baseConfig: EnvironmentConfig = {
  providerTimeoutMs: 15000,
  cacheTtlSeconds: 3600,
  cacheMaxEntries: 1000,
  profileCacheTtlSeconds: 86400,
  lineApiTimeoutMs: 5000,
  webhookAllowUnsigned: false,
  defaultTargetLanguages: ['en', 'fr', 'es'],
  port: 8080,
  debug: false,
  verbose: false,
};

describe('OpenAITranslationProvider', () => {
  it('should configure a single attempt with the timeout', () => {
    new OpenAITranslationProvider({ apiKey: 'test-key', model: 'gpt-4o-mini', timeoutMs: 1234 });

    expect(mockOpenAI.constructed).toHaveBeenCalledWith({
      apiKey: 'test-key',
      timeout: 1234,
      maxRetries: 0,
    });
  });

  it('should send the prompt and return the message content', async () => {
    mockOpenAI.create.mockResolvedValueOnce({
      choices: [{ message: { content: '{"translations":{}}' } }],
    });
    const provider = new OpenAITranslationProvider({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      timeoutMs: 1000,
    });

    const answer = await provider.complete(prompt);

    expect(answer).toBe('{"translations":{}}');
    expect(mockOpenAI.create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'translate things' },
        { role: 'user', content: 'Message:\nHello' },
      ],
      temperature: 0,
      response_format: { type: 'json_object' },
    });
  });

  it('should return an empty answer when there is no choice', async () => {
    mockOpenAI.create.mockResolvedValueOnce({ choices: [] });
    const provider = new OpenAITranslationProvider({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      timeoutMs: 1000,
    });

    await expect(provider.complete(prompt)).resolves.toBe('');
  });

  it('should wrap SDK failures', async () => {
    mockOpenAI.create.mockRejectedValueOnce(new Error('Request timed out.'));
    const provider = new OpenAITranslationProvider({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      timeoutMs: 1000,
    });

    const failure = provider.complete(prompt);

    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('OpenAI request failed: Request timed out.');
  });
});

describe('AnthropicTranslationProvider', () => {
  it('should join the text blocks of the answer', async () => {
    mockAnthropic.create.mockResolvedValueOnce({
      content: [
        { type: 'text', text: '{"detected_language":"en",' },
        { type: 'tool_use', id: 'tool-1', name: 'noop', input: {} },
        { type: 'text', text: '"translations":{}}' },
      ],
    });
    const provider = new AnthropicTranslationProvider({
      apiKey: 'test-key',
      model: 'claude-3-5-haiku-latest',
      timeoutMs: 1000,
    });

    const answer = await provider.complete(prompt);

    expect(answer).toBe('{"detected_language":"en","translations":{}}');
    expect(mockAnthropic.create).toHaveBeenCalledWith({
      model: 'claude-3-5-haiku-latest',
      max_tokens: 1024,
      temperature: 0,
      system: 'translate things',
      messages: [{ role: 'user', content: 'Message:\nHello' }],
    });
    expect(mockAnthropic.constructed).toHaveBeenCalledWith({
      apiKey: 'test-key',
      timeout: 1000,
      maxRetries: 0,
    });
  });

  it('should wrap SDK failures', async () => {
    mockAnthropic.create.mockRejectedValueOnce(new Error('overloaded'));
    const provider = new AnthropicTranslationProvider({
      apiKey: 'test-key',
      model: 'claude-3-5-haiku-latest',
      timeoutMs: 1000,
    });

    await expect(provider.complete(prompt)).rejects.toThrow(
      'Anthropic request failed: overloaded'
    );
  });
});

describe('createTranslationProvider', () => {
  it('should return null without a provider', () => {
    expect(createTranslationProvider(baseConfig)).toBeNull();
  });

  it('should return null when the selected provider has no key', () => {
    expect(
      createTranslationProvider({ ...baseConfig, provider: 'anthropic', openaiApiKey: 'test-key' })
    ).toBeNull();
  });

  it('should build the OpenAI provider with its default model', () => {
    const provider = createTranslationProvider({
      ...baseConfig,
      provider: 'openai',
      openaiApiKey: 'test-key',
    });

    expect(provider).toBeInstanceOf(OpenAITranslationProvider);
    expect(provider?.model).toBe('gpt-4o-mini');
    expect(mockOpenAI.constructed).toHaveBeenCalledWith({
      apiKey: 'test-key',
      timeout: 15000,
      maxRetries: 0,
    });
  });

  it('should build the Anthropic provider with an explicit model', () => {
    const provider = createTranslationProvider({
      ...baseConfig,
      provider: 'anthropic',
      anthropicApiKey: 'test-key',
      model: 'claude-3-5-sonnet-latest',
    });

    expect(provider).toBeInstanceOf(AnthropicTranslationProvider);
    expect(provider?.name).toBe('anthropic');
    expect(provider?.model).toBe('claude-3-5-sonnet-latest');
  });
});
