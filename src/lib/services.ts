import { TtlCache } from './cache-store.js';
import type { EnvironmentConfig } from './env-config.js';
import { LineMessagingClient } from './line-client.js';
import { ProfileResolver } from './profile-resolver.js';
import { createTranslationProvider } from './providers/index.js';
import { TranslationOrchestrator } from './translator.js';
import { WebhookProcessor } from './webhook-handler.js';
import type { TranslationProvider, TranslationResult, UserProfile } from '../types/index.js';

export interface RelayServices {
  translator: TranslationOrchestrator;
  profiles: ProfileResolver;
  webhook: WebhookProcessor;
}

export interface RelayServiceOverrides {
  provider?: TranslationProvider | null;
  line?: LineMessagingClient | null;
}

/**
 * Build the relay once at startup. Caches live here and are handed to their
 * owners explicitly; nothing below keeps module-level state.
 */
export function createRelayServices(
  config: EnvironmentConfig,
  overrides: RelayServiceOverrides = {}
): RelayServices {
  const provider =
    overrides.provider === undefined ? createTranslationProvider(config) : overrides.provider;

  const line =
    overrides.line === undefined
      ? config.lineChannelAccessToken
        ? new LineMessagingClient({
            channelAccessToken: config.lineChannelAccessToken,
            timeoutMs: config.lineApiTimeoutMs,
          })
        : null
      : overrides.line;

  const translator = new TranslationOrchestrator({
    provider,
    cache: new TtlCache<TranslationResult>({
      ttlSeconds: config.cacheTtlSeconds,
      maxEntries: config.cacheMaxEntries,
    }),
    defaultLanguages: config.defaultTargetLanguages,
  });

  const profiles = new ProfileResolver({
    fetcher: line,
    cache: new TtlCache<UserProfile>({
      ttlSeconds: config.profileCacheTtlSeconds,
      maxEntries: config.cacheMaxEntries,
    }),
  });

  const webhook = new WebhookProcessor({
    translator,
    profiles,
    replies: line,
    channelSecret: config.lineChannelSecret,
    allowUnsigned: config.webhookAllowUnsigned,
  });

  return { translator, profiles, webhook };
}
