/**
 * Validation of translation input, shared by the HTTP route and the orchestrator
 */

import { z } from 'zod';
import { ValidationError, type ValidationErrorCode } from './errors.js';
import { isTargetLanguageCode } from './language.js';
import type { TranslationInput, TranslationRequest } from '../types/index.js';

export const DEFAULT_AUTHOR = 'Unknown';

const translationInputSchema = z.object({
  author: z.string({ invalid_type_error: 'author must be a string' }).nullish(),
  text: z.string({
    required_error: 'text is required',
    invalid_type_error: 'text must be a string',
  }),
  languages: z
    .array(z.string({ invalid_type_error: 'languages must contain only strings' }), {
      invalid_type_error: 'languages must be an array of strings',
    })
    .nullish(),
  includeRenderedText: z
    .boolean({ invalid_type_error: 'includeRenderedText must be a boolean' })
    .nullish(),
});

const FIELD_ERROR_CODES: Record<string, ValidationErrorCode> = {
  author: 'invalid_author',
  text: 'missing_text',
  languages: 'invalid_languages',
  includeRenderedText: 'invalid_flag',
};

/**
 * Validate an untrusted body (parsed JSON) into a TranslationInput
 * @throws ValidationError with a field specific code
 */
export function parseTranslationInput(body: unknown): TranslationInput {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('invalid_body', 'Request body must be a JSON object');
  }

  const parsed = translationInputSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = typeof issue?.path[0] === 'string' ? issue.path[0] : '';
    let code: ValidationErrorCode = Object.hasOwn(FIELD_ERROR_CODES, field)
      ? FIELD_ERROR_CODES[field]
      : 'invalid_request';
    if (
      field === 'text' &&
      issue?.code === z.ZodIssueCode.invalid_type &&
      issue.received !== z.ZodParsedType.undefined
    ) {
      code = 'invalid_text';
    }
    throw new ValidationError(code, issue?.message ?? 'Invalid request');
  }

  const { author, text, languages, includeRenderedText } = parsed.data;
  return {
    author: author ?? undefined,
    text,
    languages: languages ?? undefined,
    includeRenderedText: includeRenderedText ?? undefined,
  };
}

/**
 * Normalize a TranslationInput: trims text, lowercases languages (order and
 * duplicates kept) and applies defaults.
 * @throws ValidationError when text is empty or the shape is wrong
 */
export function normalizeTranslationRequest(
  input: TranslationInput,
  defaultLanguages: readonly string[]
): TranslationRequest {
  const { author, text, languages, includeRenderedText } = parseTranslationInput(input);

  const trimmed = text.trim();
  if (!trimmed) {
    throw new ValidationError('empty_text', 'text must not be empty');
  }

  const targetLanguages = (languages ?? [])
    .map((language) => language.trim().toLowerCase())
    .filter(Boolean);

  const unsupported = targetLanguages.find((language) => !isTargetLanguageCode(language));
  if (unsupported !== undefined) {
    throw new ValidationError('invalid_languages', `Unsupported language code: ${unsupported}`);
  }

  return {
    author: author ?? DEFAULT_AUTHOR,
    text: trimmed,
    targetLanguages: targetLanguages.length > 0 ? targetLanguages : [...defaultLanguages],
    includeRenderedText: includeRenderedText ?? true,
  };
}
