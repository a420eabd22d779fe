import { differenceInDays, isSameDay, isValid, parseISO } from 'date-fns';
import { logger } from '../../utils/logger.js';
import { criteriaKey, type FlightOffer, type SearchCriteria } from '../flights/flights.types.js';
import type { CacheStore, DestinationCacheEntry, FlightCacheEntry } from './cache.types.js';

type Clock = () => Date;

function parseCachedAt(value: string): Date | undefined {
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : undefined;
}

// ── Destination Cache ──

/**
 * Discovered destinations per origin, valid for `expirationDays` whole days.
 * An expiration of 0 turns the cache off in both directions.
 */
export class DestinationCache {
  constructor(
    private readonly store: CacheStore<DestinationCacheEntry>,
    readonly expirationDays: number,
    private readonly now: Clock = () => new Date(),
  ) {}

  get enabled(): boolean {
    return this.expirationDays > 0;
  }

  async get(origin: string): Promise<string[] | null> {
    if (!this.enabled) return null;

    const entry = await this.store.get(origin);
    if (!entry) return null;

    const cachedAt = parseCachedAt(entry.cachedAt);
    if (!cachedAt) return null;

    const age = differenceInDays(this.now(), cachedAt);
    if (age >= this.expirationDays) {
      logger.debug(`Destination cache for ${origin} is ${age} day(s) old, refreshing`);
      return null;
    }

    logger.info(`Using cached destinations for ${origin} (cached ${age} day(s) ago)`);
    return entry.destinations;
  }

  async put(origin: string, destinations: string[]): Promise<void> {
    if (!this.enabled) return;
    await this.store.put(origin, {
      origin,
      destinations,
      cachedAt: this.now().toISOString(),
      count: destinations.length,
    });
  }
}

// ── Flight Cache ──

/**
 * Filtered offers per full search criteria. Fares for a fixed date are
 * treated as stable for the rest of the calendar day they were fetched on.
 */
export class FlightCache {
  constructor(
    private readonly store: CacheStore<FlightCacheEntry>,
    readonly enabled: boolean,
    private readonly now: Clock = () => new Date(),
  ) {}

  async get(criteria: SearchCriteria): Promise<FlightOffer[] | null> {
    if (!this.enabled) return null;

    const key = criteriaKey(criteria);
    const entry = await this.store.get(key);
    if (!entry || entry.key !== key) return null;

    const cachedAt = parseCachedAt(entry.cachedAt);
    if (!cachedAt || !isSameDay(cachedAt, this.now())) return null;

    return entry.offers;
  }

  async put(criteria: SearchCriteria, offers: FlightOffer[]): Promise<void> {
    if (!this.enabled) return;
    const key = criteriaKey(criteria);
    await this.store.put(key, { key, offers, cachedAt: this.now().toISOString() });
  }
}
