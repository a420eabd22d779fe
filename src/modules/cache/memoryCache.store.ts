import type { CacheStore } from './cache.types.js';

/**
 * Process-local store. Values are cloned on the way in and out so callers
 * cannot mutate what is cached.
 */
export class MemoryCacheStore<T> implements CacheStore<T> {
  private readonly entries = new Map<string, T>();

  async get(key: string): Promise<T | null> {
    const value = this.entries.get(key);
    return value === undefined ? null : structuredClone(value);
  }

  async put(key: string, value: T): Promise<void> {
    this.entries.set(key, structuredClone(value));
  }

  get size(): number {
    return this.entries.size;
  }
}
