// ── Barrel Export for all models ──
export { CacheEntry, type ICacheEntry } from './CacheEntry.js';
