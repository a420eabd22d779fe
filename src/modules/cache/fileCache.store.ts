import crypto from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../../utils/logger.js';
import type { CacheStore } from './cache.types.js';

const READABLE_KEY = /^[A-Za-z0-9_-]{1,64}$/;

export interface FileCacheOptions<T> {
  directory: string;
  namespace: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
}

/**
 * One JSON file per key under `<directory>/<namespace>/`. Writes go to a
 * temporary file first and are renamed into place, so a concurrent reader sees
 * either the old entry or the new one. Two writers of the same key: last wins.
 */
export class FileCacheStore<T> implements CacheStore<T> {
  private readonly root: string;

  constructor(private readonly options: FileCacheOptions<T>) {
    this.root = path.resolve(options.directory, options.namespace);
  }

  fileFor(key: string): string {
    const name = READABLE_KEY.test(key) ? key : crypto.createHash('sha1').update(key).digest('hex');
    return path.join(this.root, `${name}.json`);
  }

  async get(key: string): Promise<T | null> {
    const file = this.fileFor(key);
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn(`Cache read failed for ${file}, treating as miss`, { error: String(error) });
      }
      return null;
    }

    try {
      const stored: unknown = JSON.parse(raw);
      if (!isStoredEntry(stored) || stored.key !== key) return null;
      const parsed = this.options.schema.safeParse(stored.value);
      if (!parsed.success) {
        logger.warn(`Corrupt ${this.options.namespace} cache entry at ${file}, treating as miss`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn(`Unparseable cache file ${file}, treating as miss`, { error: String(error) });
      return null;
    }
  }

  async put(key: string, value: T): Promise<void> {
    const file = this.fileFor(key);
    const temp = `${file}.${process.pid}.${crypto.randomUUID()}.tmp`;
    try {
      await mkdir(this.root, { recursive: true });
      await writeFile(temp, JSON.stringify({ key, value }, null, 2), 'utf-8');
      await rename(temp, file);
    } catch (error) {
      logger.warn(`Cache write failed for ${file}`, { error: String(error) });
      await rm(temp, { force: true });
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isStoredEntry(value: unknown): value is { key: string; value: unknown } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string' &&
    'value' in value
  );
}
