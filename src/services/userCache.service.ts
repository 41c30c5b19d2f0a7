import { z } from 'zod';
import { ICacheStore } from '@/interfaces/ICacheStore';
import { IUserRepository } from '@/repositories/interfaces';
import { User } from '@/models';
import { CACHE_KEYS, TTL_CONFIG } from '@/config/businessRules';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('UserCacheService');

const CACHE_FORMAT_VERSION = 1;

const cachedUserSchema = z.object({
  v: z.literal(CACHE_FORMAT_VERSION),
  user: z.object({
    id: z.number().int(),
    email: z.string(),
    password: z.string(),
    confirmed: z.boolean(),
    avatar: z.string().nullable(),
    refreshToken: z.string().nullable(),
    createdAt: z.string().datetime({ offset: true }).transform((value) => new Date(value)),
  }),
});

/**
 * User Cache Service
 *
 * Cache-aside lookup of users by email. Entries live for TTL_CONFIG.USER_CACHE_TTL_SECONDS
 * and may be stale for that long: only confirmation re-writes them and only removal evicts.
 */
export class UserCacheService {
  constructor(
    private readonly cache: ICacheStore,
    private readonly userRepo: IUserRepository,
    private readonly ttlSeconds: number = TTL_CONFIG.USER_CACHE_TTL_SECONDS
  ) {}

  async getUserByEmail(email: string): Promise<User | null> {
    const key = CACHE_KEYS.user(email);
    const cached = await this.cache.get(key);

    if (cached !== null) {
      const user = this.decode(cached);
      if (user) {
        logger.debug({ key }, 'User cache hit');
        return user;
      }
      logger.warn({ key }, 'Unreadable user cache entry, reloading');
    }

    const user = await this.userRepo.findUserByEmail(email);
    if (!user) {
      return null;
    }

    await this.cache.set(key, this.encode(user), this.ttlSeconds);
    return user;
  }

  /**
   * Re-write the entry after a change that must be visible immediately
   */
  async refresh(user: User): Promise<void> {
    await this.cache.set(CACHE_KEYS.user(user.email), this.encode(user), this.ttlSeconds);
  }

  async evict(email: string): Promise<void> {
    await this.cache.delete(CACHE_KEYS.user(email));
  }

  private encode(user: User): string {
    return JSON.stringify({
      v: CACHE_FORMAT_VERSION,
      user: { ...user, createdAt: user.createdAt.toISOString() },
    });
  }

  private decode(raw: string): User | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }

    const result = cachedUserSchema.safeParse(parsed);
    return result.success ? result.data.user : null;
  }
}
