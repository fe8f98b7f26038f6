/**
 * Parsing of the provider's raw answer.
 * The text is parsed into an untyped value first, then validated field by field;
 * a translations mapping that does not fit is a MalformedProviderResponseError.
 */

import { z } from 'zod';
import { MalformedProviderResponseError } from './errors.js';
import { parseJson } from './safe-json.js';
import type { ProviderTranslation } from '../types/index.js';

const CODE_FENCE = /```[a-z0-9_-]*[ \t]*\r?\n|```/gi;
const BOLD_MARKERS = /\*\*|__/g;

// Only the translations shape is binding; a detected language that is not a
// string is reported as unknown further down
const detectedLanguageSchema = z.string().optional().catch(undefined);

const providerResponseSchema = z.object({
  detected_language: detectedLanguageSchema,
  detectedLanguage: detectedLanguageSchema,
  translations: z.record(z.string().nullable()),
});

/**
 * Remove markdown artifacts a model sometimes leaves in a value
 */
export function stripMarkdown(value: string): string {
  return value.replace(CODE_FENCE, '').replace(BOLD_MARKERS, '').trim();
}

/**
 * Extract the outermost JSON object from the raw text, tolerating fences
 * and chatter around it
 */
function extractJsonObject(raw: string): string | null {
  const text = raw.replace(CODE_FENCE, '');
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');

  if (start === -1 || end <= start) {
    return null;
  }

  return text.slice(start, end + 1);
}

export function parseProviderResponse(raw: string): ProviderTranslation {
  const json = extractJsonObject(raw);
  if (!json) {
    throw new MalformedProviderResponseError('No JSON object found in provider response');
  }

  const parsed = parseJson(json);
  if (!parsed.ok) {
    throw new MalformedProviderResponseError(
      `Provider response is not valid JSON: ${parsed.error}`
    );
  }

  const result = providerResponseSchema.safeParse(parsed.value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'response';
    throw new MalformedProviderResponseError(
      `Unexpected provider response shape at ${where}: ${issue?.message ?? 'invalid'}`
    );
  }

  return {
    detectedLanguage: result.data.detected_language ?? result.data.detectedLanguage,
    translations: result.data.translations,
  };
}

/**
 * Pick the translation for each requested code, in request order.
 * Exact keys win over case-insensitive matches; missing codes become "".
 */
export function reconcileTranslations(
  provided: Record<string, string | null>,
  requested: readonly string[]
): Record<string, string> {
  const byLowerKey = new Map<string, string | null>();
  for (const [key, value] of Object.entries(provided)) {
    const lower = key.trim().toLowerCase();
    if (!byLowerKey.has(lower)) {
      byLowerKey.set(lower, value);
    }
  }

  const entries = requested.map((code): [string, string] => {
    const value = Object.hasOwn(provided, code) ? provided[code] : byLowerKey.get(code);
    return [code, value ? stripMarkdown(value) : ''];
  });

  return Object.fromEntries(entries);
}
