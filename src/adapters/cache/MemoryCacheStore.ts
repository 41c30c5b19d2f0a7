import { ICacheStore } from '@/interfaces/ICacheStore';

interface CacheEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process cache store for development (CACHE_TYPE=memory) and tests
 *
 * Expired entries are dropped lazily on read.
 */
export class MemoryCacheStore implements ICacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
