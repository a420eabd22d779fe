import { AirportResolver, loadAirportTable } from '../modules/airports/airports.service.js';
import {
  destinationCacheEntrySchema,
  flightCacheEntrySchema,
  type CacheStore,
  type DestinationCacheEntry,
  type FlightCacheEntry,
} from '../modules/cache/cache.types.js';
import { FileCacheStore } from '../modules/cache/fileCache.store.js';
import { MemoryCacheStore } from '../modules/cache/memoryCache.store.js';
import { MongoCacheStore } from '../modules/cache/mongoCache.store.js';
import { DestinationCache, FlightCache } from '../modules/cache/searchCaches.js';
import { loadCuratedDestinations } from '../modules/destinations/curatedDestinations.js';
import { DestinationDiscoveryService } from '../modules/destinations/destinations.service.js';
import { FlightSearchService } from '../modules/flights/flights.service.js';
import { FlightMatcher } from '../modules/flights/matcher.service.js';
import { MeetingSearchService } from '../modules/meetings/meetings.service.js';
import { AmadeusClient } from '../providers/amadeus/amadeus.client.js';
import { AmadeusProvider } from '../providers/amadeus/amadeus.provider.js';
import type { FlightDataProvider } from '../providers/provider.types.js';
import { CacheBackend, type ProviderEnvironment } from '../utils/constants.js';
import type { Env } from './env.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ServiceConfig {
  environment: ProviderEnvironment;
  cacheBackend: CacheBackend;
  cacheDir: string;
  destinationCacheExpirationDays: number;
  useFlightCache: boolean;
}

export interface Services {
  provider: FlightDataProvider;
  resolver: AirportResolver;
  flightSearch: FlightSearchService;
  matcher: FlightMatcher;
  discovery: DestinationDiscoveryService;
  meetings: MeetingSearchService;
}

export function serviceConfigFromEnv(env: Env): ServiceConfig {
  return {
    environment: env.AMADEUS_ENVIRONMENT,
    cacheBackend: env.CACHE_BACKEND,
    cacheDir: env.CACHE_DIR,
    destinationCacheExpirationDays: env.DESTINATION_CACHE_EXPIRATION_DAYS,
    useFlightCache: env.USE_FLIGHT_CACHE,
  };
}

export function createAmadeusProvider(env: Env): AmadeusProvider {
  const client = new AmadeusClient({
    apiKey: env.AMADEUS_API_KEY,
    apiSecret: env.AMADEUS_API_SECRET,
    environment: env.AMADEUS_ENVIRONMENT,
    timeoutMs: env.AMADEUS_TIMEOUT_MS,
  });
  return new AmadeusProvider(client);
}

// ── Stores ──

function createStores(config: ServiceConfig): {
  destinations: CacheStore<DestinationCacheEntry>;
  flights: CacheStore<FlightCacheEntry>;
} {
  switch (config.cacheBackend) {
    case CacheBackend.MONGO:
      return {
        destinations: new MongoCacheStore({
          namespace: 'destinations',
          schema: destinationCacheEntrySchema,
          retentionMs: Math.max(1, config.destinationCacheExpirationDays) * DAY_MS,
        }),
        flights: new MongoCacheStore({ namespace: 'flights', schema: flightCacheEntrySchema, retentionMs: DAY_MS }),
      };
    case CacheBackend.MEMORY:
      return { destinations: new MemoryCacheStore(), flights: new MemoryCacheStore() };
    case CacheBackend.FILE:
      return {
        destinations: new FileCacheStore({
          directory: config.cacheDir,
          namespace: 'destinations',
          schema: destinationCacheEntrySchema,
        }),
        flights: new FileCacheStore({ directory: config.cacheDir, namespace: 'flights', schema: flightCacheEntrySchema }),
      };
  }
}

/**
 * Wire the search services around one provider. The HTTP app and the CLI
 * share this; tests pass a fake provider and the memory backend.
 */
export function createServices(config: ServiceConfig, provider: FlightDataProvider): Services {
  const resolver = new AirportResolver(loadAirportTable());
  const stores = createStores(config);

  const flightSearch = new FlightSearchService({
    provider,
    resolver,
    cache: new FlightCache(stores.flights, config.useFlightCache),
  });
  const matcher = new FlightMatcher(flightSearch, resolver);
  const discovery = new DestinationDiscoveryService({
    provider,
    cache: new DestinationCache(stores.destinations, config.destinationCacheExpirationDays),
    environment: config.environment,
    curated: loadCuratedDestinations(),
  });
  const meetings = new MeetingSearchService({ discovery, matcher, resolver });

  return { provider, resolver, flightSearch, matcher, discovery, meetings };
}
