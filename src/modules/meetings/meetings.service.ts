import { describeError } from '../../utils/appError.js';
import { logger } from '../../utils/logger.js';
import type { AirportResolver } from '../airports/airports.service.js';
import type { DestinationDiscoveryService } from '../destinations/destinations.service.js';
import { carrierSet, firstDeparture, lastArrival } from '../flights/flightOffer.js';
import type { FlightMatcher, TravelerCriteria } from '../flights/matcher.service.js';
import type { FlightOffer, MatchCandidate } from '../flights/flights.types.js';
import type { MeetingSearchRequest } from './meetings.validation.js';

export interface MeetingSearchResult {
  matches: MatchCandidate[];
  destinationsChecked: number;
  destinationsWithMatches: number;
  duplicatesRemoved: number;
  destinationSource: 'override' | 'discovered';
}

export interface MeetingSearchDeps {
  discovery: DestinationDiscoveryService;
  matcher: FlightMatcher;
  resolver: AirportResolver;
}

// ── Deduplication ──

function offerKey(offer: FlightOffer): string | null {
  const outbound = offer.itineraries[0];
  const departure = firstDeparture(outbound);
  const arrival = lastArrival(outbound);
  if (!departure || !arrival) return null;
  return `${departure}/${arrival}/${carrierSet(offer).join(',')}`;
}

/**
 * Identity of a match across destinations and nearby-origin expansions, or
 * null when an offer lacks the timestamps the key is built from.
 */
export function matchKey(match: MatchCandidate): string | null {
  const first = offerKey(match.person1Flight);
  const second = offerKey(match.person2Flight);
  if (first === null || second === null) return null;
  return [match.destination, first, second, match.person1Price, match.person2Price].join('|');
}

export function dedupeMatches(matches: MatchCandidate[]): { unique: MatchCandidate[]; removed: number } {
  const seen = new Set<string>();
  const unique: MatchCandidate[] = [];
  for (const match of matches) {
    const key = matchKey(match);
    if (key !== null) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(match);
  }
  return { unique, removed: matches.length - unique.length };
}

// ── Orchestrator ──

export class MeetingSearchService {
  constructor(private readonly deps: MeetingSearchDeps) {}

  async findMeetingDestinations(request: MeetingSearchRequest): Promise<MeetingSearchResult> {
    const { resolver, matcher } = this.deps;
    const origin1 = resolver.resolve(request.origins.person1);
    const origin2 = resolver.resolve(request.origins.person2);

    logger.info(
      `Finding meeting destinations for ${origin1} & ${origin2} ` +
        `(${request.direction}, ${request.outboundDate}${request.returnDate ? ` → ${request.returnDate}` : ''})`,
    );

    let destinationSource: MeetingSearchResult['destinationSource'] = 'override';
    let destinations = this.overrideDestinations(request.destinations);
    if (destinations.length === 0) {
      destinationSource = 'discovered';
      destinations = await this.discoverDestinations(origin1, origin2, request);
    }
    logger.info(`Checking ${destinations.length} destination(s): ${destinations.join(', ')}`);

    const criteria1 = travelerCriteria(request, 'person1');
    const criteria2 = travelerCriteria(request, 'person2');

    const all: MatchCandidate[] = [];
    let destinationsWithMatches = 0;
    for (const [index, destination] of destinations.entries()) {
      logger.info(`[${index + 1}/${destinations.length}] Checking ${destination}`);
      try {
        const matches = await matcher.findMatches({
          origin1,
          origin2,
          destination,
          criteria1,
          criteria2,
          priceCeiling1: request.maxPrice.person1,
          priceCeiling2: request.maxPrice.person2,
          toleranceHours: request.toleranceHours,
          direction: request.direction,
        });
        if (matches.length > 0) destinationsWithMatches++;
        all.push(...matches);
      } catch (error) {
        logger.error(`Error checking destination ${destination}: ${describeError(error)}`);
      }
    }

    const { unique, removed } = dedupeMatches(all);
    if (removed > 0) logger.info(`Removed ${removed} duplicate match(es)`);
    unique.sort((a, b) => a.totalPrice - b.totalPrice);

    logger.info(
      `Found ${unique.length} match(es) across ${destinationsWithMatches} of ${destinations.length} destination(s)`,
    );
    return {
      matches: unique,
      destinationsChecked: destinations.length,
      destinationsWithMatches,
      duplicatesRemoved: removed,
      destinationSource,
    };
  }

  // ── Destinations ──

  private overrideDestinations(codes: string[] | undefined): string[] {
    if (!codes || codes.length === 0) return [];

    const { resolver } = this.deps;
    const kept = new Set<string>();
    for (const code of codes) {
      const resolved = resolver.resolve(code);
      if (!resolver.isValidAirport(resolved)) {
        logger.warn(`Ignoring ${code}: not a flight destination`);
        continue;
      }
      kept.add(resolved);
    }

    if (kept.size === 0) logger.warn('No valid airports in the destination list, discovering destinations instead');
    return [...kept];
  }

  private async discoverDestinations(
    origin1: string,
    origin2: string,
    request: MeetingSearchRequest,
  ): Promise<string[]> {
    const { discovery, resolver } = this.deps;
    const ceilings = [request.maxDurationHours.person1, request.maxDurationHours.person2].filter((h) => h > 0);

    const discovered = await discovery.commonDestinations({
      origin1,
      origin2,
      departureDate: request.outboundDate,
      dynamic: request.useDynamicDestinations,
      durationCeiling: ceilings.length > 0 ? Math.min(...ceilings) : 0,
      nonStopOnly: Math.min(request.maxStops.person1, request.maxStops.person2) === 0,
    });

    const valid = discovered.filter((code) => resolver.isValidAirport(code));
    if (valid.length < discovered.length) {
      logger.debug(`Dropped ${discovered.length - valid.length} non-airport destination(s)`);
    }

    if (request.maxDestinations > 0 && valid.length > request.maxDestinations) {
      logger.info(`Limiting to the first ${request.maxDestinations} of ${valid.length} destinations`);
      return valid.slice(0, request.maxDestinations);
    }
    return valid;
  }
}

function travelerCriteria(request: MeetingSearchRequest, traveler: 'person1' | 'person2'): TravelerCriteria {
  return {
    departureDate: request.outboundDate,
    returnDate: request.returnDate,
    maxStops: request.maxStops[traveler],
    minDepartureTimeOutbound: request.minDepartureTimeOutbound,
    minDepartureTimeReturn: request.minDepartureTimeReturn,
    maxDurationHours: request.maxDurationHours[traveler],
    nearbyAirportsRadiusKm: request.nearbyAirportsRadiusKm,
  };
}
