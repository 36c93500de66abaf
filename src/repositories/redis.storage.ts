import type Redis from 'ioredis';
import { Storage, StoredValue, isStoredValue } from './storage';
import { createLogger } from '../utils/logger';

const logger = createLogger('redis-storage');

/**
 * Redis-backed storage. Values are JSON strings; TTLs map to `SET ... EX`.
 */
export class RedisStorage implements Storage {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'frameio:'
  ) {}

  async ensureReady(): Promise<void> {
    if (this.redis.status === 'wait') {
      await this.redis.connect();
    }
    await this.redis.ping();
  }

  async get(key: string): Promise<StoredValue | null> {
    const raw = await this.redis.get(this.prefix + key);
    if (raw === null) return null;

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isStoredValue(parsed)) return parsed;
    } catch (error) {
      logger.warn(`Discarding unreadable value at ${key}:`, error instanceof Error ? error.message : error);
      return null;
    }
    logger.warn(`Discarding non-object value at ${key}`);
    return null;
  }

  async put(key: string, value: StoredValue, options: { ttl?: number } = {}): Promise<void> {
    const payload = JSON.stringify(value);
    if (options.ttl !== undefined) {
      // Redis rejects EX 0; a zero TTL means "already expired"
      if (options.ttl <= 0) {
        await this.redis.del(this.prefix + key);
        return;
      }
      await this.redis.set(this.prefix + key, payload, 'EX', Math.ceil(options.ttl));
      return;
    }
    await this.redis.set(this.prefix + key, payload);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }
}
