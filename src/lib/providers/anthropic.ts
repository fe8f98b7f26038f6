import Anthropic from '@anthropic-ai/sdk';
import { ProviderError, getErrorMessage } from '../errors.js';
import type { ProviderPrompt, TranslationProvider } from '../../types/index.js';

const MAX_TOKENS = 1024;

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AnthropicTranslationProvider implements TranslationProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: ProviderPrompt): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: MAX_TOKENS,
        temperature: 0,
        system: prompt.system,
        messages: [{ role: 'user', content: prompt.user }],
      });

      return response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
    } catch (error) {
      throw new ProviderError(`Anthropic request failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
