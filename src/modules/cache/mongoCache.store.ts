import type { ZodType, ZodTypeDef } from 'zod';
import { CacheEntry } from '../../models/index.js';
import { logger } from '../../utils/logger.js';
import type { CacheStore } from './cache.types.js';

export interface MongoCacheOptions<T> {
  namespace: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** How long MongoDB keeps a document before its TTL index removes it */
  retentionMs: number;
}

/**
 * Cache documents in the `cacheentries` collection. Writes are single atomic
 * upserts keyed by namespace and key, so concurrent writers never interleave.
 */
export class MongoCacheStore<T> implements CacheStore<T> {
  constructor(private readonly options: MongoCacheOptions<T>) {}

  async get(key: string): Promise<T | null> {
    try {
      const doc = await CacheEntry.findOne({ namespace: this.options.namespace, key })
        .lean<{ value: unknown }>()
        .exec();
      if (!doc) return null;

      const parsed = this.options.schema.safeParse(doc.value);
      if (!parsed.success) {
        logger.warn(`Corrupt ${this.options.namespace} cache document for ${key}, treating as miss`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn(`Cache lookup failed for ${this.options.namespace}/${key}`, { error: String(error) });
      return null;
    }
  }

  async put(key: string, value: T): Promise<void> {
    try {
      await CacheEntry.findOneAndUpdate(
        { namespace: this.options.namespace, key },
        { $set: { value, expiresAt: new Date(Date.now() + this.options.retentionMs) } },
        { upsert: true },
      ).exec();
    } catch (error) {
      logger.warn(`Cache write failed for ${this.options.namespace}/${key}`, { error: String(error) });
    }
  }
}
