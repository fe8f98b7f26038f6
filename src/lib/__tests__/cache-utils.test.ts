import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { fingerprintTranslationRequest, generateCacheKey } from '../cache-utils.js';

describe('generateCacheKey', () => {
  it('should produce a sha256 hex digest', () => {
    expect(generateCacheKey('abc')).toBe(createHash('sha256').update('abc').digest('hex'));
    expect(generateCacheKey('abc')).toHaveLength(64);
  });
});

describe('fingerprintTranslationRequest', () => {
  it('should be deterministic for identical input', () => {
    const first = fingerprintTranslationRequest('Alice', 'Hello there', ['fr', 'ja']);
    const second = fingerprintTranslationRequest('Alice', 'Hello there', ['fr', 'ja']);

    expect(first).toBe(second);
  });

  it('should digest the canonical JSON of author, text and languages', () => {
    const expected = createHash('sha256')
      .update('{"author":"Alice","text":"Hi","languages":["fr"]}')
      .digest('hex');

    expect(fingerprintTranslationRequest('Alice', 'Hi', ['fr'])).toBe(expected);
  });

  it('should change when any field changes', () => {
    const base = fingerprintTranslationRequest('Alice', 'Hello', ['fr', 'ja']);

    expect(fingerprintTranslationRequest('Bob', 'Hello', ['fr', 'ja'])).not.toBe(base);
    expect(fingerprintTranslationRequest('Alice', 'Hello!', ['fr', 'ja'])).not.toBe(base);
    expect(fingerprintTranslationRequest('Alice', 'Hello', ['fr'])).not.toBe(base);
  });

  it('should be sensitive to language order', () => {
    expect(fingerprintTranslationRequest('Alice', 'Hello', ['fr', 'ja'])).not.toBe(
      fingerprintTranslationRequest('Alice', 'Hello', ['ja', 'fr'])
    );
  });

  it('should not confuse field boundaries', () => {
    expect(fingerprintTranslationRequest('a|b', 'c', [])).not.toBe(
      fingerprintTranslationRequest('a', 'b|c', [])
    );
  });
});
