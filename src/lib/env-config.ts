/**
 * Centralized and validated environment variable configuration
 * Every env read in the relay goes through here
 */

import {
  getEnvVar,
  getEnvVarBoolean,
  getEnvVarEnum,
  getEnvVarInt,
  getEnvVarList,
} from './env-validator.js';

export type ProviderName = 'openai' | 'anthropic';

export const PROVIDER_NAMES = ['openai', 'anthropic'] as const satisfies readonly ProviderName[];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

export const CONFIG_DEFAULTS = {
  PORT: 8080,
  CACHE_TTL_SECONDS: 3600,
  CACHE_MAX_ENTRIES: 1000,
  PROFILE_CACHE_TTL_SECONDS: 86400,
  PROVIDER_TIMEOUT_MS: 15000,
  LINE_API_TIMEOUT_MS: 5000,
  TARGET_LANGUAGES: ['en', 'fr', 'es'],
} as const;

export type EnvironmentConfig = {
  // API Keys (sensitive)
  openaiApiKey?: string;
  anthropicApiKey?: string;
  lineChannelSecret?: string;
  lineChannelAccessToken?: string;

  // Provider
  provider?: ProviderName;
  model?: string;
  providerTimeoutMs: number;

  // Caching
  cacheTtlSeconds: number;
  cacheMaxEntries: number;
  profileCacheTtlSeconds: number;

  // Webhook / platform
  lineApiTimeoutMs: number;
  webhookAllowUnsigned: boolean;

  // Application Configuration
  defaultTargetLanguages: string[];
  port: number;

  // Debug Configuration
  debug: boolean;
  verbose: boolean;
};

/**
 * Load and validate all environment variables
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  const openaiApiKey = getEnvVar('OPENAI_API_KEY');
  const anthropicApiKey = getEnvVar('ANTHROPIC_API_KEY');

  return {
    openaiApiKey,
    anthropicApiKey,
    lineChannelSecret: getEnvVar('LINE_CHANNEL_SECRET'),
    lineChannelAccessToken: getEnvVar('LINE_CHANNEL_ACCESS_TOKEN'),

    provider:
      getEnvVarEnum('TRANSLATION_PROVIDER', PROVIDER_NAMES) ??
      detectProvider(openaiApiKey, anthropicApiKey),
    model: getEnvVar('TRANSLATION_MODEL'),
    providerTimeoutMs: getEnvVarInt('PROVIDER_TIMEOUT_MS', CONFIG_DEFAULTS.PROVIDER_TIMEOUT_MS, 1),

    // TTLs may be zero or negative, which disables the cache
    cacheTtlSeconds: getEnvVarInt('CACHE_TTL_SECONDS', CONFIG_DEFAULTS.CACHE_TTL_SECONDS),
    cacheMaxEntries: getEnvVarInt('CACHE_MAX_ENTRIES', CONFIG_DEFAULTS.CACHE_MAX_ENTRIES, 1),
    profileCacheTtlSeconds: getEnvVarInt(
      'PROFILE_CACHE_TTL_SECONDS',
      CONFIG_DEFAULTS.PROFILE_CACHE_TTL_SECONDS
    ),

    lineApiTimeoutMs: getEnvVarInt('LINE_API_TIMEOUT_MS', CONFIG_DEFAULTS.LINE_API_TIMEOUT_MS, 1),
    webhookAllowUnsigned: getEnvVarBoolean('WEBHOOK_ALLOW_UNSIGNED'),

    defaultTargetLanguages: getEnvVarList('DEFAULT_TARGET_LANGUAGES') ?? [
      ...CONFIG_DEFAULTS.TARGET_LANGUAGES,
    ],
    port: getEnvVarInt('PORT', CONFIG_DEFAULTS.PORT, 1),

    // Debug flags
    debug: Boolean(getEnvVar('DEBUG')),
    verbose: Boolean(getEnvVar('VERBOSE')),
  };
}

function detectProvider(openaiApiKey?: string, anthropicApiKey?: string): ProviderName | undefined {
  if (openaiApiKey) {
    return 'openai';
  }

  if (anthropicApiKey) {
    return 'anthropic';
  }

  return undefined;
}

// Singleton instance to avoid repeated validation
let _config: EnvironmentConfig | null = null;

/**
 * Get validated environment configuration (singleton)
 */
export function getEnvironmentConfig(): EnvironmentConfig {
  _config ??= loadEnvironmentConfig();
  return _config;
}

/**
 * Drop the memoized configuration so the next read sees the current environment
 */
export function resetEnvironmentConfig(): void {
  _config = null;
}

/**
 * Credential for the selected provider, if any
 */
export function getProviderApiKey(config: EnvironmentConfig): string | undefined {
  switch (config.provider) {
    case 'openai':
      return config.openaiApiKey;
    case 'anthropic':
      return config.anthropicApiKey;
    default:
      return undefined;
  }
}

/**
 * Model for the selected provider, falling back to its default
 */
export function resolveModel(config: EnvironmentConfig): string | undefined {
  if (!config.provider) {
    return undefined;
  }

  return config.model ?? DEFAULT_MODELS[config.provider];
}

/**
 * Get safe configuration for logging (excludes sensitive data)
 */
export function getSafeConfig(
  config: EnvironmentConfig = getEnvironmentConfig()
): Omit<
  EnvironmentConfig,
  'openaiApiKey' | 'anthropicApiKey' | 'lineChannelSecret' | 'lineChannelAccessToken'
> & { hasProviderKey: boolean; hasChannelSecret: boolean; hasChannelAccessToken: boolean } {
  const {
    openaiApiKey: _openaiApiKey,
    anthropicApiKey: _anthropicApiKey,
    lineChannelSecret,
    lineChannelAccessToken,
    ...rest
  } = config;

  return {
    ...rest,
    model: resolveModel(config),
    hasProviderKey: Boolean(getProviderApiKey(config)),
    hasChannelSecret: Boolean(lineChannelSecret),
    hasChannelAccessToken: Boolean(lineChannelAccessToken),
  };
}
