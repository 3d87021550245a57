/**
 * In-Memory Cache Implementation (Default / Fallback)
 *
 * Used when Redis is not configured or unavailable.
 */

import type { JsonValue } from '../../types/utils.js';
import { logger } from '../../utils/logger.js';
import type { CacheProvider } from './types.js';

interface Entry {
  value: JsonValue;
  expiresAt: number;
}

export class MemoryCache implements CacheProvider {
  private cache: Map<string, Entry> = new Map();
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: { maxSize?: number; now?: () => number } = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.now = options.now ?? Date.now;
  }

  getType(): string {
    return 'memory';
  }

  async get(key: string): Promise<JsonValue | undefined> {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }

    // LRU Promotion: Delete and re-add to move to end of Map
    this.cache.delete(key);
    this.cache.set(key, entry);
    // Return a clone to prevent external mutation
    return structuredClone(entry.value);
  }

  async set(key: string, value: JsonValue, ttlSeconds: number): Promise<void> {
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      // Map iterates in insertion order (oldest first)
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
        logger.debug(`Evicted cache entry to make space: ${oldest.value}`);
      }
    }

    this.cache.set(key, {
      value: structuredClone(value),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async close(): Promise<void> {
    this.cache.clear();
  }
}
