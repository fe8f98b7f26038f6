import type { ProviderPrompt } from '../types/index.js';

const SYSTEM_PROMPT = `You are a professional translator for a chat relay.
Detect the language of the user's message automatically and translate it into each requested language.
Preserve tone, register and the meaning of idioms rather than substituting words literally.
Respond with a single JSON object and nothing else: no markdown, no code fences, no commentary.`;

/**
 * Build the provider prompt for one translation request
 */
export function buildTranslationPrompt(text: string, targetLanguages: readonly string[]): ProviderPrompt {
  const codes = targetLanguages.map((code) => `"${code}"`).join(', ');
  const shape = targetLanguages.map((code) => `"${code}": "<translation>"`).join(', ');

  const user = `Translate the message below into exactly these language codes, in this order: ${codes}.

Return JSON in this exact shape:
{"detected_language": "<ISO 639-1 code of the source language>", "translations": {${shape}}}

Message:
${text}`;

  return { system: SYSTEM_PROMPT, user };
}
