import { vi } from 'vitest';
import { AirportResolver, loadAirportTable } from '../modules/airports/airports.service.js';
import type { FlightOffer, Itinerary, Segment } from '../modules/flights/flights.types.js';
import type {
  AirportLocation,
  DestinationSuggestion,
  FlightDataProvider,
  GeoPoint,
  InspirationQuery,
  OfferQuery,
} from '../providers/provider.types.js';

// ── Offers ──

export interface SegmentInput {
  from: string;
  to: string;
  departAt?: string;
  arriveAt?: string;
  carrier?: string;
  stops?: number;
}

export function segment(input: SegmentInput): Segment {
  return {
    carrierCode: input.carrier ?? 'XX',
    departure: { iataCode: input.from, at: input.departAt },
    arrival: { iataCode: input.to, at: input.arriveAt },
    numberOfStops: input.stops ?? 0,
  };
}

export function itinerary(segments: SegmentInput[], duration?: string): Itinerary {
  return { duration, segments: segments.map(segment) };
}

export function offer(id: string, total: number, itineraries: Itinerary[], currency = 'EUR'): FlightOffer {
  return { id, price: { total, currency }, itineraries };
}

/** A one-way, single-segment offer */
export function directOffer(
  id: string,
  total: number,
  route: { from: string; to: string; departAt: string; arriveAt: string; carrier?: string },
): FlightOffer {
  return offer(id, total, [itinerary([route])]);
}

// ── Collaborators ──

export function createFakeProvider() {
  return {
    name: 'fake',
    searchOffers: vi.fn<(query: OfferQuery) => Promise<FlightOffer[]>>(async () => []),
    inspirationDestinations: vi.fn<(query: InspirationQuery) => Promise<DestinationSuggestion[]>>(async () => []),
    directDestinations: vi.fn<(origin: string) => Promise<string[]>>(async () => []),
    locateAirport: vi.fn<(code: string) => Promise<GeoPoint | null>>(async () => null),
    nearbyAirports: vi.fn<(point: GeoPoint, radiusKm: number) => Promise<AirportLocation[]>>(async () => []),
  } satisfies FlightDataProvider;
}

export type FakeProvider = ReturnType<typeof createFakeProvider>;

export function createResolver(): AirportResolver {
  return new AirportResolver(loadAirportTable());
}
