import { getErrorMessage } from './errors.js';

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

/**
 * Parse untrusted JSON text without throwing. The value stays `unknown` until
 * a schema narrows it; reporting a failure is left to the caller.
 */
export function parseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: getErrorMessage(error) };
  }
}
