import { logger } from '@/utils/logger';

type Clock = () => number;

export class CacheService {
  private cache: Map<string, { value: unknown; expiry: number }> = new Map();
  private inFlight: Map<string, Promise<unknown>> = new Map();

  constructor(private readonly now: Clock = Date.now) {
    logger.info('Using in-memory cache');
  }

  /**
   * Set a key-value pair in cache
   */
  set<T>(key: string, value: T, ttlSeconds: number = 3600): void {
    const expiry = this.now() + (ttlSeconds * 1000);
    this.cache.set(key, { value, expiry });
    logger.debug(`Cache set: ${key} (TTL: ${ttlSeconds}s)`);
  }

  /**
   * Get a value from cache
   */
  get<T>(key: string): T | null {
    const item = this.cache.get(key);
    if (item && item.expiry > this.now()) {
      logger.debug(`Cache hit: ${key}`);
      return item.value as T;
    }

    // Remove expired item
    if (item) {
      this.cache.delete(key);
    }

    logger.debug(`Cache miss: ${key}`);
    return null;
  }

  /**
   * Return the cached value for `key`, or run `fetcher` and cache its result.
   * Callers asking for the same key while a fetch is pending share that fetch.
   * A rejected fetch is not cached.
   */
  async getOrFetch<T>(key: string, ttlSeconds: number, fetcher: () => Promise<T>): Promise<{ value: T; hit: boolean }> {
    const cached = this.get<T>(key);
    if (cached !== null) {
      return { value: cached, hit: true };
    }

    const pending = this.inFlight.get(key) as Promise<T> | undefined;
    if (pending) {
      return { value: await pending, hit: true };
    }

    const promise = fetcher();
    this.inFlight.set(key, promise);
    try {
      const value = await promise;
      this.set(key, value, ttlSeconds);
      return { value, hit: false };
    } finally {
      this.inFlight.delete(key);
    }
  }

  /**
   * Clear all cache
   */
  clear(): void {
    this.cache.clear();
    logger.info('Cache cleared');
  }

  /**
   * Get TTL for a key in seconds, -1 when absent or expired
   */
  getTTL(key: string): number {
    const item = this.cache.get(key);
    if (item && item.expiry > this.now()) {
      return Math.ceil((item.expiry - this.now()) / 1000);
    }

    if (item) {
      this.cache.delete(key);
    }

    return -1;
  }
}

export const cacheService = new CacheService();
