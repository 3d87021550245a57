/**
 * Cache Factory (Auto-Detect Logic)
 *
 * Redis when a URL is configured, otherwise the in-memory cache.
 */

import { errorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { CacheProvider } from './types.js';
import { MemoryCache } from './memory.js';
import { RedisCache } from './redis.js';

export function createCache(redisUrl?: string): CacheProvider {
  if (redisUrl) {
    logger.info('REDIS_URL detected. Initializing Redis cache...');
    try {
      // The class handles connection errors internally without crashing.
      return new RedisCache(redisUrl);
    } catch (error) {
      logger.warn(`Failed to initialize Redis client (${errorMessage(error)}). Falling back to Memory.`);
    }
  } else {
    logger.info('No REDIS_URL found. Using in-memory cache.');
  }

  return new MemoryCache();
}

export type { CacheProvider } from './types.js';
export { MemoryCache } from './memory.js';
export { RedisCache } from './redis.js';
