import { describe, it, expect } from 'vitest';
import { languageIndicator, normalizeLanguageCode, UNKNOWN_LANGUAGE } from '../language.js';

describe('normalizeLanguageCode', () => {
  it('should map known language names to their codes', () => {
    expect(normalizeLanguageCode('English')).toBe('en');
    expect(normalizeLanguageCode('french')).toBe('fr');
    expect(normalizeLanguageCode('SPANISH')).toBe('es');
    expect(normalizeLanguageCode('Italian')).toBe('it');
    expect(normalizeLanguageCode('Persian')).toBe('fa');
    expect(normalizeLanguageCode('Farsi')).toBe('fa');
    expect(normalizeLanguageCode('  japanese ')).toBe('ja');
  });

  it('should keep values that are already code-shaped', () => {
    expect(normalizeLanguageCode('xx')).toBe('xx');
    expect(normalizeLanguageCode('EN')).toBe('en');
    expect(normalizeLanguageCode('fil')).toBe('fil');
  });

  it('should report anything else as unknown', () => {
    expect(normalizeLanguageCode('gibberish-name')).toBe(UNKNOWN_LANGUAGE);
    expect(normalizeLanguageCode('klingonese')).toBe('unknown');
    expect(normalizeLanguageCode('e')).toBe('unknown');
    expect(normalizeLanguageCode('en-US')).toBe('unknown');
    expect(normalizeLanguageCode('')).toBe('unknown');
    expect(normalizeLanguageCode(undefined)).toBe('unknown');
    expect(normalizeLanguageCode(null)).toBe('unknown');
  });

  it('should not resolve inherited object keys as language names', () => {
    expect(normalizeLanguageCode('constructor')).toBe('unknown');
  });
});

describe('languageIndicator', () => {
  it('should prefix known codes with their flag', () => {
    expect(languageIndicator('fr')).toBe('🇫🇷 FR:');
    expect(languageIndicator('ja')).toBe('🇯🇵 JA:');
  });

  it('should bracket codes without a flag', () => {
    expect(languageIndicator('xx')).toBe('[XX]:');
    expect(languageIndicator('toString')).toBe('[TOSTRING]:');
  });
});
