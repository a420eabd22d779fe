import { runPooled, settledOr } from '../../utils/concurrency.js';
import { DEFAULT_CURRENCY, type FlightDirection } from '../../utils/constants.js';
import { describeError } from '../../utils/appError.js';
import { logger } from '../../utils/logger.js';
import { hoursBetween } from '../../utils/time.js';
import type { AirportResolver } from '../airports/airports.service.js';
import { FILTER_POLICY, passesOnMissing } from './flightFilters.js';
import { meetingTime } from './flightOffer.js';
import type { FlightSearchService } from './flights.service.js';
import type { FlightOffer, MatchCandidate, SearchCriteria } from './flights.types.js';

/** One traveler's search limits; route and direction come from the match request */
export type TravelerCriteria = Omit<SearchCriteria, 'origin' | 'destination' | 'direction'>;

export interface MatchRequest {
  origin1: string;
  origin2: string;
  destination: string;
  criteria1: TravelerCriteria;
  criteria2: TravelerCriteria;
  priceCeiling1: number;
  priceCeiling2: number;
  toleranceHours: number;
  direction: FlightDirection;
}

/**
 * True when both offers' meeting times fall within `toleranceHours` of each
 * other, boundary included. A missing or unparseable time never matches.
 */
export function timesMatch(
  first: FlightOffer,
  second: FlightOffer,
  toleranceHours: number,
  direction: FlightDirection,
): boolean {
  const gap = hoursBetween(meetingTime(first, direction), meetingTime(second, direction));
  if (gap === undefined) return passesOnMissing(FILTER_POLICY.timeMatching);
  return gap <= toleranceHours;
}

export class FlightMatcher {
  constructor(
    private readonly flights: FlightSearchService,
    private readonly resolver: AirportResolver,
  ) {}

  async findMatches(request: MatchRequest): Promise<MatchCandidate[]> {
    const origin1 = this.resolver.resolve(request.origin1);
    const origin2 = this.resolver.resolve(request.origin2);
    const destination = this.resolver.resolve(request.destination);
    const { direction } = request;

    logger.info(`Searching for matching flights to ${destination} (${origin1} & ${origin2})`);

    const [side1, side2] = await runPooled([
      () => this.flights.searchFlights({ ...request.criteria1, origin: origin1, destination, direction }),
      () => this.flights.searchFlights({ ...request.criteria2, origin: origin2, destination, direction }),
    ]);
    for (const [label, side] of [['Person 1', side1], ['Person 2', side2]] as const) {
      if (side.status === 'rejected') {
        logger.warn(`${label} flight search for ${destination} failed: ${describeError(side.reason)}`);
      }
    }
    const flights1 = settledOr(side1, []);
    const flights2 = settledOr(side2, []);

    logger.info(`Found ${flights1.length} flight(s) for Person 1, ${flights2.length} flight(s) for Person 2`);

    const matches: MatchCandidate[] = [];
    let priceRejected = 0;
    let timeRejected = 0;

    for (const f1 of flights1) {
      const price1 = f1.price.total;
      if (price1 > request.priceCeiling1) {
        priceRejected += flights2.length;
        continue;
      }

      for (const f2 of flights2) {
        const price2 = f2.price.total;
        if (price2 > request.priceCeiling2) {
          priceRejected++;
          continue;
        }
        if (!timesMatch(f1, f2, request.toleranceHours, direction)) {
          timeRejected++;
          continue;
        }

        matches.push({
          destination,
          person1Flight: f1,
          person2Flight: f2,
          person1Price: price1,
          person2Price: price2,
          totalPrice: price1 + price2,
          currency: f1.price.currency || DEFAULT_CURRENCY,
        });
      }
    }

    if (priceRejected > 0) logger.debug(`Filtered out ${priceRejected} combination(s) due to price constraints`);
    if (timeRejected > 0) logger.debug(`Filtered out ${timeRejected} combination(s) due to time mismatch`);

    matches.sort((a, b) => a.totalPrice - b.totalPrice);
    logger.info(
      matches.length > 0
        ? `Found ${matches.length} matching flight pair(s) for ${destination}`
        : `No matching flight pairs found for ${destination}`,
    );
    return matches;
  }
}
