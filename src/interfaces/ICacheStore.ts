/**
 * Cache Store Interface
 *
 * Minimal string key/value store with expiry. Implemented over Redis in
 * production and over an in-process Map for development and tests.
 */
export interface ICacheStore {
  /**
   * @returns the stored value, or null when the key is absent or expired
   */
  get(key: string): Promise<string | null>;

  /**
   * Store a value that expires after ttlSeconds
   */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  delete(key: string): Promise<void>;
}
