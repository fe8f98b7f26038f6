import { z } from 'zod';
import type { CacheStore } from './cache-store.js';
import { settle } from './error-handlers.js';
import type { ProfileFetcher } from './line-client.js';
import { loggers } from './logger.js';
import type { UserProfile } from '../types/index.js';

const profileSchema = z.object({
  displayName: z.string(),
  pictureUrl: z.string().optional(),
  statusMessage: z.string().optional(),
});

/**
 * Short stand-in for a user id when no display name is known
 */
export function maskUserId(userId: string): string {
  if (userId.length <= 8) {
    return 'User';
  }
  return `${userId.slice(0, 4)}***${userId.slice(-4)}`;
}

export interface ProfileResolverOptions {
  /** Null when no platform credential is configured; lookups then resolve empty */
  fetcher: ProfileFetcher | null;
  cache: CacheStore<UserProfile>;
  ttlSeconds?: number;
}

/**
 * Resolves platform user ids to profiles, with its own cache.
 * Lookup failures resolve to an empty profile and are not cached.
 */
export class ProfileResolver {
  private readonly fetcher: ProfileFetcher | null;
  private readonly cache: CacheStore<UserProfile>;
  private readonly ttlSeconds?: number;

  constructor(options: ProfileResolverOptions) {
    this.fetcher = options.fetcher;
    this.cache = options.cache;
    this.ttlSeconds = options.ttlSeconds;
  }

  async resolve(userId: string): Promise<UserProfile> {
    const cached = this.cache.get(userId);
    if (cached) {
      return cached;
    }

    const fetcher = this.fetcher;
    if (!fetcher) {
      return {};
    }

    const lookup = await settle(() => this.lookup(fetcher, userId));
    if (!lookup.ok) {
      loggers.profileLookupFailed(userId, lookup.error);
      return {};
    }

    return lookup.value;
  }

  private async lookup(fetcher: ProfileFetcher, userId: string): Promise<UserProfile> {
    const response = await fetcher.getProfile(userId);
    if (!response.ok) {
      loggers.profileLookupFailed(userId, response.error ?? `HTTP ${response.status}`);
      return {};
    }

    const parsed = profileSchema.safeParse(response.data);
    if (!parsed.success) {
      loggers.profileLookupFailed(userId, 'unexpected profile payload');
      return {};
    }

    const profile: UserProfile = Object.freeze({ ...parsed.data });
    this.cache.set(userId, profile, this.ttlSeconds);
    return profile;
  }

  async displayNameFor(userId: string): Promise<string> {
    const profile = await this.resolve(userId);
    return profile.displayName?.trim() || maskUserId(userId);
  }
}
