/**
 * Language code helpers
 */

export const UNKNOWN_LANGUAGE = 'unknown';

const LANGUAGE_NAME_TO_CODE: Record<string, string> = {
  english: 'en',
  french: 'fr',
  spanish: 'es',
  italian: 'it',
  persian: 'fa',
  farsi: 'fa',
  german: 'de',
  portuguese: 'pt',
  russian: 'ru',
  japanese: 'ja',
  chinese: 'zh',
  korean: 'ko',
  arabic: 'ar',
  turkish: 'tr',
  thai: 'th',
  vietnamese: 'vi',
  hindi: 'hi',
  indonesian: 'id',
  dutch: 'nl',
};

const LANGUAGE_FLAGS: Record<string, string> = {
  en: '🇬🇧',
  fr: '🇫🇷',
  es: '🇪🇸',
  it: '🇮🇹',
  fa: '🇮🇷',
  de: '🇩🇪',
  pt: '🇵🇹',
  ru: '🇷🇺',
  ja: '🇯🇵',
  zh: '🇨🇳',
  ko: '🇰🇷',
  ar: '🇸🇦',
  tr: '🇹🇷',
  th: '🇹🇭',
  vi: '🇻🇳',
  hi: '🇮🇳',
  id: '🇮🇩',
  nl: '🇳🇱',
};

const CODE_PATTERN = /^[a-z]{2,3}$/;

/**
 * Normalize a provider's detected-language answer into a 2-3 letter code.
 * Known language names map to their code, code-shaped values pass through,
 * anything else is reported as unknown.
 */
export function normalizeLanguageCode(value: string | null | undefined): string {
  const candidate = (value ?? '').trim().toLowerCase();

  if (Object.hasOwn(LANGUAGE_NAME_TO_CODE, candidate)) {
    return LANGUAGE_NAME_TO_CODE[candidate];
  }

  if (CODE_PATTERN.test(candidate)) {
    return candidate;
  }

  return UNKNOWN_LANGUAGE;
}

// "fr", "pt-br", "zh-hant"; never numeric, so object keys keep insertion order
const TARGET_CODE_PATTERN = /^[a-z]{2,3}(?:-[a-z0-9]{2,8})*$/;

/**
 * Whether a lowercased code can be requested as a translation target
 */
export function isTargetLanguageCode(code: string): boolean {
  return TARGET_CODE_PATTERN.test(code);
}

/**
 * Prefix used for a language line in the rendered block, e.g. "🇫🇷 FR:" or "[XX]:"
 */
export function languageIndicator(code: string): string {
  const upper = code.toUpperCase();
  const flag = Object.hasOwn(LANGUAGE_FLAGS, code) ? LANGUAGE_FLAGS[code] : undefined;
  return flag ? `${flag} ${upper}:` : `[${upper}]:`;
}
