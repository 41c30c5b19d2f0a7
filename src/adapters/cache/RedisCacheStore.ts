/**
 * Redis Cache Store
 *
 * The client is created and connected in server.ts and closed at shutdown;
 * this adapter never owns its lifecycle.
 */

import { ICacheStore } from '@/interfaces/ICacheStore';
import { RedisClient } from '@/config/redis';

export class RedisCacheStore implements ICacheStore {
  constructor(private readonly client: RedisClient) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, { EX: ttlSeconds });
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }
}
