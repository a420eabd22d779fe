import { describeError, isProviderError } from '../../utils/appError.js';
import { FlightDirection } from '../../utils/constants.js';
import { logger } from '../../utils/logger.js';
import type { FlightDataProvider, OfferQuery } from '../../providers/provider.types.js';
import type { AirportResolver } from '../airports/airports.service.js';
import type { FlightCache } from '../cache/searchCaches.js';
import { applyFilters } from './flightFilters.js';
import type { FlightOffer, SearchCriteria } from './flights.types.js';

export interface FlightSearchDeps {
  provider: FlightDataProvider;
  resolver: AirportResolver;
  cache: FlightCache;
}

/**
 * Retrieves and filters offers for one route. Provider failures never escape:
 * a failing origin is skipped, anything worse yields an empty list.
 */
export class FlightSearchService {
  private readonly nearby = new Map<string, string[]>();

  constructor(private readonly deps: FlightSearchDeps) {}

  async searchFlights(input: SearchCriteria): Promise<FlightOffer[]> {
    const { resolver, cache } = this.deps;
    const criteria: SearchCriteria = {
      ...input,
      origin: resolver.resolve(input.origin),
      destination: resolver.resolve(input.destination),
    };
    const route = `${criteria.origin} → ${criteria.destination}`;

    const cached = await cache.get(criteria);
    if (cached) {
      logger.debug(`Using today's cached flights for ${route} (${cached.length})`);
      return cached;
    }

    let filtered: FlightOffer[];
    try {
      const origins = await this.expandOrigins(criteria.origin, criteria.nearbyAirportsRadiusKm);
      const offers = await this.queryOrigins(origins, criteria);
      logger.info(`Total flights found from all airports: ${offers.length} for ${route}`);
      if (offers.length === 0) return [];

      const outcome = applyFilters(offers, criteria);
      const { stops, departureTime, duration } = outcome.removed;
      if (stops + departureTime + duration > 0) {
        logger.debug(
          `Filtered ${route}: -${stops} over ${criteria.maxStops} stop(s), -${departureTime} too early, -${duration} too long`,
        );
      }
      filtered = outcome.offers;
    } catch (error) {
      logger.error(`Unexpected error while searching flights ${route}: ${describeError(error)}`);
      return [];
    }

    try {
      await cache.put(criteria, filtered);
    } catch (error) {
      logger.warn(`Could not cache flights for ${route}: ${describeError(error)}`);
    }

    logger.info(`Final result: ${filtered.length} flight(s) after filtering for ${route}`);
    return filtered;
  }

  // ── Origins ──

  private async queryOrigins(origins: string[], criteria: SearchCriteria): Promise<FlightOffer[]> {
    const all: FlightOffer[] = [];
    for (const origin of origins) {
      try {
        const offers = await this.deps.provider.searchOffers(toOfferQuery(criteria, origin));
        logger.debug(`Provider returned ${offers.length} flight(s) for ${origin} → ${criteria.destination}`);
        all.push(...offers.map((offer) => ({ ...offer, searchOrigin: origin })));
      } catch (error) {
        const line = `Skipping ${origin} → ${criteria.destination}: ${describeError(error)}`;
        if (isProviderError(error)) logger.warn(line);
        else logger.error(line);
      }
    }
    return all;
  }

  /**
   * The origin plus every airport within `radiusKm` of it. Lookups are done
   * once per origin and radius; any failure falls back to the origin alone.
   */
  async expandOrigins(origin: string, radiusKm: number): Promise<string[]> {
    if (radiusKm <= 0) return [origin];

    const memoKey = `${origin}:${radiusKm}`;
    const known = this.nearby.get(memoKey);
    if (known) return known;

    const { provider, resolver } = this.deps;
    try {
      const point = await provider.locateAirport(origin);
      if (!point) {
        logger.debug(`No coordinates for ${origin}, searching it alone`);
        return [origin];
      }

      const airports = await provider.nearbyAirports(point, radiusKm);
      const codes = new Set<string>([origin]);
      for (const airport of airports) {
        const code = resolver.resolve(airport.iataCode);
        if (resolver.isValidAirport(code)) codes.add(code);
      }

      const expanded = [...codes];
      this.nearby.set(memoKey, expanded);
      logger.info(`Found ${expanded.length} airport(s) within ${radiusKm} km of ${origin}: ${expanded.join(', ')}`);
      return expanded;
    } catch (error) {
      logger.debug(`Nearby airport lookup failed for ${origin}: ${describeError(error)}`);
      return [origin];
    }
  }
}

/**
 * Return-only searches fly from the destination back to the traveler's home
 * airport (or one near it) on the return date.
 */
export function toOfferQuery(criteria: SearchCriteria, origin: string): OfferQuery {
  if (criteria.direction === FlightDirection.RETURN_ONLY) {
    return {
      origin: criteria.destination,
      destination: origin,
      departureDate: criteria.returnDate ?? criteria.departureDate,
      direction: criteria.direction,
    };
  }
  return {
    origin,
    destination: criteria.destination,
    departureDate: criteria.departureDate,
    returnDate: criteria.direction === FlightDirection.ROUND_TRIP ? criteria.returnDate : undefined,
    direction: criteria.direction,
  };
}
