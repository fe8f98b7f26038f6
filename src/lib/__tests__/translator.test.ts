import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TtlCache } from '../cache-store.js';
import {
  MalformedProviderResponseError,
  ProviderError,
  ProviderUnavailableError,
  ValidationError,
} from '../errors.js';
import { TranslationOrchestrator } from '../translator.js';
import type { ProviderPrompt, TranslationProvider, TranslationResult } from '../../types/index.js';

function createProvider(answer: string | Error) {
  const complete = vi.fn(async (_prompt: ProviderPrompt): Promise<string> => {
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  });
  const provider: TranslationProvider = { name: 'stub', model: 'stub-model', complete };
  return { provider, complete };
}

function createOrchestrator(provider: TranslationProvider | null, ttlSeconds = 60) {
  const cache = new TtlCache<TranslationResult>({ ttlSeconds, maxEntries: 100 });
  const translator = new TranslationOrchestrator({
    provider,
    cache,
    defaultLanguages: ['en', 'fr'],
  });
  return { translator, cache };
}

const SALUT = '{"detected_language":"english","translations":{"fr":"Salut"}}';

describe('TranslationOrchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should translate and normalize a provider answer', async () => {
    const { provider } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider);

    const result = await translator.translate({
      author: 'Alice',
      text: 'Hello there',
      languages: ['fr'],
    });

    expect(result).toEqual({
      author: 'Alice',
      originalText: 'Hello there',
      detectedLanguage: 'en',
      translations: { fr: 'Salut' },
      renderedText: 'Author: Alice\nDetected: en\nOriginal: Hello there\n🇫🇷 FR: Salut',
    });
  });

  it('should report an unusable detected language as unknown', async () => {
    for (const detected of ['null', '5', '{"name":"english"}']) {
      const { provider } = createProvider(
        `{"detected_language":${detected},"translations":{"fr":"Salut"}}`
      );
      const { translator } = createOrchestrator(provider);

      const result = await translator.translate({ author: 'Alice', text: 'Hi', languages: ['fr'] });

      expect(result.detectedLanguage).toBe('unknown');
      expect(result.translations).toEqual({ fr: 'Salut' });
      expect(result.renderedText).toBe('Author: Alice\nDetected: unknown\nOriginal: Hi\n🇫🇷 FR: Salut');
    }
  });

  it('should omit the rendered text when asked to', async () => {
    const { provider } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider);

    const result = await translator.translate({
      author: 'Alice',
      text: 'Hello there',
      languages: ['fr'],
      includeRenderedText: false,
    });

    expect(result).toEqual({
      author: 'Alice',
      originalText: 'Hello there',
      detectedLanguage: 'en',
      translations: { fr: 'Salut' },
    });
    expect('renderedText' in result).toBe(false);
  });

  it('should not call the provider again for a repeated request within the TTL', async () => {
    const { provider, complete } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider);
    const input = { author: 'Alice', text: 'Hello there', languages: ['fr'] };

    const first = await translator.translate(input);
    complete.mockClear();
    const second = await translator.translate(input);

    expect(complete).toHaveBeenCalledTimes(0);
    expect(second).toEqual(first);
  });

  it('should share cache entries between requests that normalize the same', async () => {
    const { provider, complete } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider);

    await translator.translate({ author: 'Alice', text: 'Hello there', languages: ['FR'] });
    await translator.translate({
      author: 'Alice',
      text: '  Hello there ',
      languages: ['fr'],
      includeRenderedText: false,
    });

    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('should call the provider again when the language order changes', async () => {
    const { provider, complete } = createProvider(
      '{"detected_language":"en","translations":{"fr":"Salut","es":"Hola"}}'
    );
    const { translator } = createOrchestrator(provider);

    await translator.translate({ author: 'Alice', text: 'Hi', languages: ['fr', 'es'] });
    await translator.translate({ author: 'Alice', text: 'Hi', languages: ['es', 'fr'] });

    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should call the provider every time when caching is disabled', async () => {
    const { provider, complete } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider, 0);
    const input = { text: 'Hello there', languages: ['fr'] };

    await translator.translate(input);
    await translator.translate(input);

    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should reject empty text before touching the provider', async () => {
    const { provider, complete } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider);

    await expect(translator.translate({ author: 'Alice', text: '   ' })).rejects.toThrow(
      ValidationError
    );
    expect(complete).not.toHaveBeenCalled();
  });

  it('should return every requested language even when the provider omits some', async () => {
    const { provider } = createProvider('{"detected_language":"fr","translations":{"en":"Hi"}}');
    const { translator } = createOrchestrator(provider);

    const result = await translator.translate({ text: 'Salut', languages: ['en', 'fr'] });

    expect(result.translations).toEqual({ en: 'Hi', fr: '' });
    expect(Object.keys(result.translations)).toEqual(['en', 'fr']);
  });

  it('should use the default languages and author when none are given', async () => {
    const { provider, complete } = createProvider(
      '{"detected_language":"gibberish-name","translations":{"en":"Hello","fr":"Bonjour"}}'
    );
    const { translator } = createOrchestrator(provider);

    const result = await translator.translate({ text: 'Hallo' });

    expect(result.author).toBe('Unknown');
    expect(result.detectedLanguage).toBe('unknown');
    expect(result.translations).toEqual({ en: 'Hello', fr: 'Bonjour' });
    expect(complete.mock.calls[0][0].user).toContain('"en", "fr"');
  });

  it('should send the text and requested codes to the provider', async () => {
    const { provider, complete } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider);

    await translator.translate({ text: 'Hello there', languages: ['fr'] });

    const prompt = complete.mock.calls[0][0];
    expect(prompt.system).toContain('Detect the language');
    expect(prompt.user).toContain('in this order: "fr"');
    expect(prompt.user.endsWith('Message:\nHello there')).toBe(true);
  });

  it('should fail with ProviderUnavailableError when no provider is configured', async () => {
    const { translator } = createOrchestrator(null);

    await expect(translator.translate({ text: 'Hello' })).rejects.toThrow(ProviderUnavailableError);
  });

  it('should still serve cached results when no provider is configured', async () => {
    const { provider } = createProvider(SALUT);
    const { translator, cache } = createOrchestrator(provider);
    await translator.translate({ author: 'Alice', text: 'Hello there', languages: ['fr'] });

    const offline = new TranslationOrchestrator({
      provider: null,
      cache,
      defaultLanguages: ['en', 'fr'],
    });

    await expect(
      offline.translate({ author: 'Alice', text: 'Hello there', languages: ['fr'] })
    ).resolves.toMatchObject({ translations: { fr: 'Salut' } });
  });

  it('should wrap unexpected provider failures in ProviderError', async () => {
    const cause = new Error('socket hang up');
    const { provider } = createProvider(cause);
    const { translator } = createOrchestrator(provider);

    const failure = translator.translate({ text: 'Hello' });

    await expect(failure).rejects.toThrow(ProviderError);
    await expect(failure).rejects.toMatchObject({ code: 'provider_error', cause });
  });

  it('should pass provider errors through unchanged', async () => {
    const { provider } = createProvider(new ProviderError('OpenAI request failed: timeout'));
    const { translator } = createOrchestrator(provider);

    await expect(translator.translate({ text: 'Hello' })).rejects.toThrow(
      'OpenAI request failed: timeout'
    );
  });

  it('should not cache a malformed provider response', async () => {
    const { provider, complete } = createProvider('I think it says hello');
    const { translator, cache } = createOrchestrator(provider);

    await expect(translator.translate({ text: 'Hello' })).rejects.toThrow(
      MalformedProviderResponseError
    );
    expect(cache.size).toBe(0);

    complete.mockResolvedValueOnce(SALUT);
    const result = await translator.translate({ text: 'Hello', languages: ['fr'] });
    expect(result.translations).toEqual({ fr: 'Salut' });
  });

  it('should return frozen results', async () => {
    const { provider } = createProvider(SALUT);
    const { translator } = createOrchestrator(provider);

    const result = await translator.translate({ text: 'Hello there', languages: ['fr'] });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.translations)).toBe(true);
  });
});
