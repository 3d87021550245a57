/**
 * Cache Interface Definitions
 * Defines the contract for cache providers (Memory, Redis).
 *
 * Callers treat the cache as opportunistic: a miss and a failure look the
 * same, and implementations never throw from these methods.
 */

import type { JsonValue } from '../../types/utils.js';

export interface CacheProvider {
  /**
   * Get a value, or undefined on miss, expiry or backend failure.
   */
  get(key: string): Promise<JsonValue | undefined>;

  /**
   * Store a value for ttlSeconds.
   */
  set(key: string, value: JsonValue, ttlSeconds: number): Promise<void>;

  /**
   * Remove a key. Resolves false when nothing was removed.
   */
  delete(key: string): Promise<boolean>;

  /**
   * Returns 'memory' or 'redis' for diagnostics.
   */
  getType(): string;

  /**
   * Release connections.
   */
  close(): Promise<void>;
}
