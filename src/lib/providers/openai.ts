import OpenAI from 'openai';
import { ProviderError, getErrorMessage } from '../errors.js';
import type { ProviderPrompt, TranslationProvider } from '../../types/index.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class OpenAITranslationProvider implements TranslationProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model;
    // one attempt per request, the caller may resubmit
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: ProviderPrompt): Promise<string> {
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: 0,
        response_format: { type: 'json_object' },
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw new ProviderError(`OpenAI request failed: ${getErrorMessage(error)}`, { cause: error });
    }

    return content ?? '';
  }
}
