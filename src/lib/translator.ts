/**
 * Translation Orchestrator
 * validation -> fingerprint -> cache -> provider -> parse -> normalize -> render -> cache
 */

import { fingerprintTranslationRequest } from './cache-utils.js';
import type { CacheStore } from './cache-store.js';
import { ProviderError, ProviderUnavailableError, isRelayError } from './errors.js';
import { normalizeLanguageCode } from './language.js';
import { loggers } from './logger.js';
import { buildTranslationPrompt } from './prompts.js';
import { renderTranslationBlock } from './render.js';
import { normalizeTranslationRequest } from './request.js';
import { parseProviderResponse, reconcileTranslations } from './response-parser.js';
import type {
  TranslationInput,
  TranslationProvider,
  TranslationResult,
  Translator,
} from '../types/index.js';

export interface TranslationOrchestratorOptions {
  provider: TranslationProvider | null;
  cache: CacheStore<TranslationResult>;
  defaultLanguages: readonly string[];
  /** Overrides the cache's own TTL when set */
  cacheTtlSeconds?: number;
}

export class TranslationOrchestrator implements Translator {
  private readonly provider: TranslationProvider | null;
  private readonly cache: CacheStore<TranslationResult>;
  private readonly defaultLanguages: readonly string[];
  private readonly cacheTtlSeconds?: number;

  constructor(options: TranslationOrchestratorOptions) {
    this.provider = options.provider;
    this.cache = options.cache;
    this.defaultLanguages = options.defaultLanguages;
    this.cacheTtlSeconds = options.cacheTtlSeconds;
  }

  async translate(input: TranslationInput): Promise<TranslationResult> {
    const request = normalizeTranslationRequest(input, this.defaultLanguages);
    const key = fingerprintTranslationRequest(request.author, request.text, request.targetLanguages);

    const cached = this.cache.get(key);
    if (cached) {
      loggers.debug(`Translation cache hit ${key.slice(0, 12)}`);
      return withRenderedText(cached, request.includeRenderedText);
    }

    const provider = this.provider;
    if (!provider) {
      throw new ProviderUnavailableError();
    }

    const raw = await this.callProvider(provider, request.text, request.targetLanguages);
    const parsed = parseProviderResponse(raw);

    const translations = reconcileTranslations(parsed.translations, request.targetLanguages);
    const base = {
      author: request.author,
      originalText: request.text,
      detectedLanguage: normalizeLanguageCode(parsed.detectedLanguage),
      translations: Object.freeze(translations),
    };
    const result: TranslationResult = Object.freeze({
      ...base,
      renderedText: renderTranslationBlock(base),
    });

    this.cache.set(key, result, this.cacheTtlSeconds);
    return withRenderedText(result, request.includeRenderedText);
  }

  private async callProvider(
    provider: TranslationProvider,
    text: string,
    targetLanguages: readonly string[]
  ): Promise<string> {
    loggers.debug(`Calling ${provider.name} (${provider.model}) for [${targetLanguages.join(', ')}]`);

    try {
      return await provider.complete(buildTranslationPrompt(text, targetLanguages));
    } catch (error) {
      loggers.providerFailed(provider.name, error);
      if (isRelayError(error)) {
        throw error;
      }
      throw new ProviderError(`${provider.name} request failed`, { cause: error });
    }
  }
}

function withRenderedText(result: TranslationResult, include: boolean): TranslationResult {
  if (include) {
    return result;
  }

  const { renderedText: _renderedText, ...rest } = result;
  return rest;
}
