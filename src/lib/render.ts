import { languageIndicator } from './language.js';
import type { TranslationResult } from '../types/index.js';

type RenderableResult = Pick<
  TranslationResult,
  'author' | 'originalText' | 'detectedLanguage' | 'translations'
>;

/** Keep each field on its own line */
function singleLine(value: string): string {
  return value.replace(/\r\n|\r|\n/g, ' ');
}

/**
 * Flatten a translation result into a plain text block for chat platforms
 */
export function renderTranslationBlock(result: RenderableResult): string {
  const lines = [
    `Author: ${singleLine(result.author)}`,
    `Detected: ${singleLine(result.detectedLanguage)}`,
    `Original: ${singleLine(result.originalText)}`,
    ...Object.entries(result.translations).map(
      ([code, text]) => `${languageIndicator(code)} ${singleLine(text)}`
    ),
  ];

  return lines.map((line) => `${line}\n`).join('').trimEnd();
}
