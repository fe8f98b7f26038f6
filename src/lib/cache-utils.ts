import { createHash } from 'crypto';

/**
 * Generate a secure cache key for arbitrary content using SHA-256
 */
export function generateCacheKey(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Cache key for a translation request.
 * Field order is fixed so the serialization is reproducible, and the language
 * list is kept in request order since it drives the order of the rendered output.
 */
export function fingerprintTranslationRequest(
  author: string,
  text: string,
  languages: readonly string[]
): string {
  return generateCacheKey(JSON.stringify({ author, text, languages }));
}
