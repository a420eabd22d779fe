import { beforeEach, describe, expect, it } from 'vitest';
import { AppError } from '../../utils/appError.js';
import { FlightDirection } from '../../utils/constants.js';
import { createFakeProvider, createResolver, directOffer, itinerary, offer, type FakeProvider } from '../../test/fixtures.js';
import type { FlightCacheEntry } from '../cache/cache.types.js';
import { MemoryCacheStore } from '../cache/memoryCache.store.js';
import { FlightCache } from '../cache/searchCaches.js';
import { FlightSearchService, toOfferQuery } from './flights.service.js';
import type { SearchCriteria } from './flights.types.js';

const criteria = (overrides: Partial<SearchCriteria> = {}): SearchCriteria => ({
  origin: 'BRU',
  destination: 'LIS',
  departureDate: '2026-12-04',
  maxStops: 0,
  maxDurationHours: 0,
  nearbyAirportsRadiusKm: 0,
  direction: FlightDirection.OUTBOUND_ONLY,
  ...overrides,
});

const bruLis = directOffer('bru-1', 120, {
  from: 'BRU',
  to: 'LIS',
  departAt: '2026-12-04T07:00:00',
  arriveAt: '2026-12-04T09:00:00',
});
const crlLis = directOffer('crl-1', 60, {
  from: 'CRL',
  to: 'LIS',
  departAt: '2026-12-04T06:00:00',
  arriveAt: '2026-12-04T08:10:00',
});

describe('FlightSearchService', () => {
  let provider: FakeProvider;
  let store: MemoryCacheStore<FlightCacheEntry>;
  let service: FlightSearchService;

  beforeEach(() => {
    provider = createFakeProvider();
    store = new MemoryCacheStore();
    service = new FlightSearchService({
      provider,
      resolver: createResolver(),
      cache: new FlightCache(store, true),
    });
  });

  it('resolves station aliases before calling the provider', async () => {
    provider.searchOffers.mockResolvedValue([bruLis]);

    await service.searchFlights(criteria({ origin: 'ZYR', destination: 'lis' }));

    expect(provider.searchOffers).toHaveBeenCalledTimes(1);
    expect(provider.searchOffers.mock.calls[0][0]).toMatchObject({ origin: 'BRU', destination: 'LIS' });
  });

  it('tags offers with the origin they were found from', async () => {
    provider.searchOffers.mockResolvedValue([bruLis]);

    const offers = await service.searchFlights(criteria());
    expect(offers).toEqual([{ ...bruLis, searchOrigin: 'BRU' }]);
  });

  it('serves a repeated search from the cache', async () => {
    provider.searchOffers.mockResolvedValue([bruLis]);

    const first = await service.searchFlights(criteria());
    const second = await service.searchFlights(criteria());

    expect(second).toEqual(first);
    expect(provider.searchOffers).toHaveBeenCalledTimes(1);
  });

  it('does not cache an empty result', async () => {
    await service.searchFlights(criteria());
    await service.searchFlights(criteria());

    expect(provider.searchOffers).toHaveBeenCalledTimes(2);
    expect(store.size).toBe(0);
  });

  it('caches the filtered result', async () => {
    const connecting = offer('via-mad', 80, [
      itinerary([
        { from: 'BRU', to: 'MAD' },
        { from: 'MAD', to: 'LIS' },
      ]),
    ]);
    provider.searchOffers.mockResolvedValue([bruLis, connecting]);

    const offers = await service.searchFlights(criteria({ maxStops: 0 }));

    expect(offers.map((o) => o.id)).toEqual(['bru-1']);
    expect(store.size).toBe(1);
  });

  it('searches nearby airports within the radius', async () => {
    provider.locateAirport.mockResolvedValue({ latitude: 50.9, longitude: 4.48 });
    provider.nearbyAirports.mockResolvedValue([
      { iataCode: 'CRL', subType: 'AIRPORT', latitude: 50.46, longitude: 4.45 },
      { iataCode: 'BRU', subType: 'AIRPORT', latitude: 50.9, longitude: 4.48 },
      { iataCode: 'ZYR', subType: 'AIRPORT', latitude: 50.83, longitude: 4.33 },
    ]);
    provider.searchOffers.mockImplementation(async (query) => (query.origin === 'CRL' ? [crlLis] : [bruLis]));

    const offers = await service.searchFlights(criteria({ nearbyAirportsRadiusKm: 100 }));

    expect(provider.searchOffers.mock.calls.map(([query]) => query.origin)).toEqual(['BRU', 'CRL']);
    expect(offers.map((o) => [o.id, o.searchOrigin])).toEqual([
      ['bru-1', 'BRU'],
      ['crl-1', 'CRL'],
    ]);
  });

  it('skips an origin whose provider call fails', async () => {
    provider.locateAirport.mockResolvedValue({ latitude: 50.9, longitude: 4.48 });
    provider.nearbyAirports.mockResolvedValue([
      { iataCode: 'CRL', subType: 'AIRPORT', latitude: 50.46, longitude: 4.45 },
    ]);
    provider.searchOffers.mockImplementation(async (query) => {
      if (query.origin === 'BRU') throw AppError.provider('rate limited', 429);
      return [crlLis];
    });

    const offers = await service.searchFlights(criteria({ nearbyAirportsRadiusKm: 100 }));
    expect(offers.map((o) => o.id)).toEqual(['crl-1']);
  });

  it('falls back to the origin alone when the nearby lookup fails', async () => {
    provider.locateAirport.mockRejectedValue(AppError.provider('down', 500));

    expect(await service.expandOrigins('BRU', 100)).toEqual(['BRU']);
  });

  it('looks nearby airports up once per origin and radius', async () => {
    provider.locateAirport.mockResolvedValue({ latitude: 50.9, longitude: 4.48 });
    provider.nearbyAirports.mockResolvedValue([
      { iataCode: 'CRL', subType: 'AIRPORT', latitude: 50.46, longitude: 4.45 },
    ]);

    expect(await service.expandOrigins('BRU', 100)).toEqual(['BRU', 'CRL']);
    expect(await service.expandOrigins('BRU', 100)).toEqual(['BRU', 'CRL']);
    expect(provider.nearbyAirports).toHaveBeenCalledTimes(1);
  });

  it('returns an empty list when every origin fails', async () => {
    provider.searchOffers.mockRejectedValue(AppError.provider('unauthorized', 401));
    expect(await service.searchFlights(criteria())).toEqual([]);
  });
});

describe('toOfferQuery', () => {
  it('flies from the destination on the return date for return-only searches', () => {
    const query = toOfferQuery(
      criteria({ direction: FlightDirection.RETURN_ONLY, returnDate: '2026-12-07' }),
      'CRL',
    );
    expect(query).toEqual({
      origin: 'LIS',
      destination: 'CRL',
      departureDate: '2026-12-07',
      direction: FlightDirection.RETURN_ONLY,
    });
  });

  it('sends the return date only for round trips', () => {
    expect(toOfferQuery(criteria({ returnDate: '2026-12-07' }), 'BRU').returnDate).toBeUndefined();
    expect(
      toOfferQuery(criteria({ direction: FlightDirection.ROUND_TRIP, returnDate: '2026-12-07' }), 'BRU').returnDate,
    ).toBe('2026-12-07');
  });
});
