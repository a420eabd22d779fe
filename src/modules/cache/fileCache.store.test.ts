import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { destinationCacheEntrySchema, type DestinationCacheEntry } from './cache.types.js';
import { FileCacheStore } from './fileCache.store.js';

const entry: DestinationCacheEntry = {
  origin: 'BRU',
  destinations: ['LIS', 'MAD'],
  cachedAt: '2026-10-01T08:00:00.000Z',
  count: 2,
};

describe('FileCacheStore', () => {
  let directory: string;
  let store: FileCacheStore<DestinationCacheEntry>;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'meeting-cache-'));
    store = new FileCacheStore({ directory, namespace: 'destinations', schema: destinationCacheEntrySchema });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('returns null for a missing key', async () => {
    expect(await store.get('BRU')).toBeNull();
  });

  it('reads back what it wrote', async () => {
    await store.put('BRU', entry);
    expect(await store.get('BRU')).toEqual(entry);
  });

  it('leaves no temporary files behind', async () => {
    await store.put('BRU', entry);
    await store.put('BRU', { ...entry, count: 3, destinations: ['LIS', 'MAD', 'OPO'] });

    expect(await readdir(path.join(directory, 'destinations'))).toEqual(['BRU.json']);
    expect(await store.get('BRU')).toMatchObject({ count: 3 });
  });

  it('hashes keys that are not safe file names', async () => {
    const key = 'BRU|LIS|2026-12-04';
    expect(path.basename(store.fileFor(key))).toMatch(/^[0-9a-f]{40}\.json$/);

    await store.put(key, entry);
    expect(await store.get(key)).toEqual(entry);
  });

  it('treats an unparseable file as a miss', async () => {
    await store.put('BRU', entry);
    await writeFile(store.fileFor('BRU'), '{ not json', 'utf-8');
    expect(await store.get('BRU')).toBeNull();
  });

  it('treats an entry failing the schema as a miss', async () => {
    await store.put('BRU', entry);
    await writeFile(store.fileFor('BRU'), JSON.stringify({ key: 'BRU', value: { origin: 'BRU' } }), 'utf-8');
    expect(await store.get('BRU')).toBeNull();
  });

  it('treats an entry stored under another key as a miss', async () => {
    await store.put('BRU', entry);
    await writeFile(store.fileFor('MAD'), JSON.stringify({ key: 'BRU', value: entry }), 'utf-8');
    expect(await store.get('MAD')).toBeNull();
  });
});
