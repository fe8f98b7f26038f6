import { AnthropicTranslationProvider } from './anthropic.js';
import { OpenAITranslationProvider } from './openai.js';
import { getProviderApiKey, resolveModel, type EnvironmentConfig } from '../env-config.js';
import type { TranslationProvider } from '../../types/index.js';

export { AnthropicTranslationProvider, OpenAITranslationProvider };

/**
 * Build the configured provider, or null when no provider/credential is set
 */
export function createTranslationProvider(config: EnvironmentConfig): TranslationProvider | null {
  const apiKey = getProviderApiKey(config);
  const model = resolveModel(config);

  if (!config.provider || !apiKey || !model) {
    return null;
  }

  const options = { apiKey, model, timeoutMs: config.providerTimeoutMs };

  switch (config.provider) {
    case 'openai':
      return new OpenAITranslationProvider(options);
    case 'anthropic':
      return new AnthropicTranslationProvider(options);
  }
}
