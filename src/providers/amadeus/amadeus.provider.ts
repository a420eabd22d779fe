import type { ZodType, ZodTypeDef } from 'zod';
import { FlightDirection, MAX_OFFERS_PER_QUERY } from '../../utils/constants.js';
import { logger } from '../../utils/logger.js';
import type { FlightOffer } from '../../modules/flights/flights.types.js';
import type {
  AirportLocation,
  DestinationSuggestion,
  FlightDataProvider,
  GeoPoint,
  InspirationQuery,
  OfferQuery,
} from '../provider.types.js';
import type { AmadeusClient } from './amadeus.client.js';
import {
  dataEnvelopeSchema,
  directDestinationSchema,
  flightOfferSchema,
  inspirationItemSchema,
  locationSchema,
  type RawFlightOffer,
} from './amadeus.schemas.js';

/**
 * Parse each element of a `{ data: [...] }` envelope, dropping the ones that
 * do not fit. The rest of the codebase only ever sees the normalized shape.
 */
function parseItems<T>(body: unknown, schema: ZodType<T, ZodTypeDef, unknown>, label: string): T[] {
  const envelope = dataEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    logger.warn(`Amadeus ${label} response had no data array`);
    return [];
  }

  const items: T[] = [];
  let dropped = 0;
  for (const raw of envelope.data.data) {
    const parsed = schema.safeParse(raw);
    if (parsed.success) items.push(parsed.data);
    else dropped++;
  }
  if (dropped > 0) logger.debug(`Dropped ${dropped} malformed ${label} item(s)`);
  return items;
}

function toFlightOffer(raw: RawFlightOffer): FlightOffer {
  return {
    id: raw.id,
    price: { total: raw.price.total, currency: raw.price.currency },
    itineraries: raw.itineraries.map((itinerary) => ({
      duration: itinerary.duration,
      segments: itinerary.segments.map((segment) => ({
        carrierCode: segment.carrierCode,
        departure: { iataCode: segment.departure.iataCode.toUpperCase(), at: segment.departure.at },
        arrival: { iataCode: segment.arrival.iataCode.toUpperCase(), at: segment.arrival.at },
        numberOfStops: segment.numberOfStops,
      })),
    })),
  };
}

export class AmadeusProvider implements FlightDataProvider {
  readonly name = 'amadeus';

  constructor(private readonly client: AmadeusClient) {}

  // ── Flight Offers Search ──

  async searchOffers(query: OfferQuery): Promise<FlightOffer[]> {
    const roundTrip = query.direction === FlightDirection.ROUND_TRIP;
    const body = await this.client.get('/v2/shopping/flight-offers', {
      originLocationCode: query.origin,
      destinationLocationCode: query.destination,
      departureDate: query.departureDate,
      returnDate: roundTrip ? query.returnDate : undefined,
      adults: 1,
      max: MAX_OFFERS_PER_QUERY,
    });

    return parseItems(body, flightOfferSchema, 'flight offer').map(toFlightOffer);
  }

  // ── Flight Inspiration Search ──

  async inspirationDestinations(query: InspirationQuery): Promise<DestinationSuggestion[]> {
    const body = await this.client.get('/v1/shopping/flight-destinations', {
      origin: query.origin,
      departureDate: query.departureDate,
      oneWay: query.oneWay,
      nonStop: query.nonStop,
      viewBy: 'DESTINATION',
    });

    return parseItems(body, inspirationItemSchema, 'inspiration').map((item) => ({
      destination: item.destination.toUpperCase(),
      price: item.price?.total,
      departureDate: item.departureDate,
      returnDate: item.returnDate,
    }));
  }

  // ── Airport Routes ──

  async directDestinations(origin: string): Promise<string[]> {
    const body = await this.client.get('/v1/airport/direct-destinations', { departureAirportCode: origin });
    return parseItems(body, directDestinationSchema, 'direct destination').map((item) => item.iataCode.toUpperCase());
  }

  // ── Reference Data ──

  async locateAirport(code: string): Promise<GeoPoint | null> {
    const body = await this.client.get('/v1/reference-data/locations', {
      subType: 'AIRPORT,CITY',
      keyword: code,
      view: 'LIGHT',
    });

    const locations = parseItems(body, locationSchema, 'location');
    const exact =
      locations.find((loc) => loc.iataCode.toUpperCase() === code && loc.subType === 'AIRPORT') ??
      locations.find((loc) => loc.iataCode.toUpperCase() === code);
    return exact ? { latitude: exact.geoCode.latitude, longitude: exact.geoCode.longitude } : null;
  }

  async nearbyAirports(point: GeoPoint, radiusKm: number): Promise<AirportLocation[]> {
    const body = await this.client.get('/v1/reference-data/locations/airports', {
      latitude: point.latitude,
      longitude: point.longitude,
      radius: radiusKm,
    });

    return parseItems(body, locationSchema, 'nearby airport').map((loc) => ({
      iataCode: loc.iataCode.toUpperCase(),
      subType: loc.subType,
      name: loc.name,
      latitude: loc.geoCode.latitude,
      longitude: loc.geoCode.longitude,
    }));
  }
}
