/**
 * Redis Cache Implementation (Production)
 *
 * Uses ioredis for connection handling. Every failure is logged and reported
 * to the caller as a miss.
 */

import { Redis } from 'ioredis';
import { errorMessage } from '../../types/errors.js';
import type { JsonValue } from '../../types/utils.js';
import { logger } from '../../utils/logger.js';
import type { CacheProvider } from './types.js';

/**
 * The subset of the ioredis client this cache uses.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

export class RedisCache implements CacheProvider {
  private redis: RedisClient;
  private readonly prefix: string;

  constructor(connection: string | RedisClient, prefix = 'groundql:') {
    this.prefix = prefix;

    if (typeof connection !== 'string') {
      this.redis = connection;
      return;
    }

    const redis = new Redis(connection, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        // If Redis is down, don't crash loop forever, just warn
        if (times > 5) {
          logger.warn('Redis connection unstable. Retrying...');
          return 5000; // 5s delay
        }
        return Math.min(times * 50, 2000);
      },
    });

    redis.on('error', (err: Error) => {
      // Don't crash process on redis error
      logger.error(`Redis Error: ${err.message}`);
    });

    redis.on('connect', () => {
      logger.info('Redis connected');
    });

    this.redis = redis;
  }

  getType(): string {
    return 'redis';
  }

  private key(id: string): string {
    return `${this.prefix}${id}`;
  }

  async get(key: string): Promise<JsonValue | undefined> {
    try {
      const data = await this.redis.get(this.key(key));
      if (data === null) return undefined;
      const value: JsonValue = JSON.parse(data);
      return value;
    } catch (e) {
      logger.warn(`Redis get error for ${key}: ${errorMessage(e)}`);
      return undefined;
    }
  }

  async set(key: string, value: JsonValue, ttlSeconds: number): Promise<void> {
    try {
      // Use setex to enforce TTL
      await this.redis.setex(this.key(key), Math.max(1, Math.round(ttlSeconds)), JSON.stringify(value));
    } catch (e) {
      logger.warn(`Redis set error for ${key}: ${errorMessage(e)}`);
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const result = await this.redis.del(this.key(key));
      return result > 0;
    } catch (e) {
      logger.warn(`Redis delete error for ${key}: ${errorMessage(e)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (e) {
      logger.warn(`Redis quit error: ${errorMessage(e)}`);
    }
  }
}
