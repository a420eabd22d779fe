import { includesOutbound, includesReturn } from '../../utils/constants.js';
import { parseClock, wallClockMinutes } from '../../utils/time.js';
import { firstDeparture, legDurationHours, offerStops, outboundLeg, returnLeg } from './flightOffer.js';
import type { FlightOffer, Itinerary, SearchCriteria } from './flights.types.js';

export type MissingDataPolicy = 'fail-open' | 'fail-closed';

/**
 * What each check does when the data it needs is absent or unparseable.
 * fail-open keeps the offer, fail-closed drops it.
 */
export const FILTER_POLICY = {
  stops: 'fail-closed',
  departureTime: 'fail-open',
  duration: 'fail-open',
  timeMatching: 'fail-closed',
} as const satisfies Record<string, MissingDataPolicy>;

export function passesOnMissing(policy: MissingDataPolicy): boolean {
  return policy === 'fail-open';
}

// ── Stops ──

export function withinStopLimit(offer: FlightOffer, maxStops: number): boolean {
  if (offer.itineraries.length === 0) return passesOnMissing(FILTER_POLICY.stops);
  return offerStops(offer) <= Math.max(0, maxStops);
}

// ── Departure Time ──

function legDepartsAfter(leg: Itinerary | undefined, minimum: string | undefined): boolean {
  if (!minimum) return true;
  const minMinutes = parseClock(minimum);
  if (minMinutes === undefined) return true;

  const departed = wallClockMinutes(firstDeparture(leg));
  if (departed === undefined) return passesOnMissing(FILTER_POLICY.departureTime);
  return departed >= minMinutes;
}

export function meetsDepartureTimes(offer: FlightOffer, criteria: SearchCriteria): boolean {
  if (
    includesOutbound(criteria.direction) &&
    !legDepartsAfter(outboundLeg(offer, criteria.direction), criteria.minDepartureTimeOutbound)
  ) {
    return false;
  }
  if (
    includesReturn(criteria.direction) &&
    !legDepartsAfter(returnLeg(offer, criteria.direction), criteria.minDepartureTimeReturn)
  ) {
    return false;
  }
  return true;
}

// ── Duration ──

export function withinDurationLimit(offer: FlightOffer, criteria: SearchCriteria): boolean {
  if (criteria.maxDurationHours <= 0) return true;

  const legs = [outboundLeg(offer, criteria.direction), returnLeg(offer, criteria.direction)];
  for (const leg of legs) {
    if (!leg) continue;
    const hours = legDurationHours(leg);
    if (hours === undefined) {
      if (!passesOnMissing(FILTER_POLICY.duration)) return false;
      continue;
    }
    if (hours > criteria.maxDurationHours) return false;
  }
  return true;
}

// ── Pipeline ──

export interface FilterOutcome {
  offers: FlightOffer[];
  removed: { stops: number; departureTime: number; duration: number };
}

/**
 * Apply the filters in their fixed order: stops, departure time, duration.
 */
export function applyFilters(offers: FlightOffer[], criteria: SearchCriteria): FilterOutcome {
  const byStops = offers.filter((offer) => withinStopLimit(offer, criteria.maxStops));
  const byDeparture = byStops.filter((offer) => meetsDepartureTimes(offer, criteria));
  const byDuration = byDeparture.filter((offer) => withinDurationLimit(offer, criteria));

  return {
    offers: byDuration,
    removed: {
      stops: offers.length - byStops.length,
      departureTime: byStops.length - byDeparture.length,
      duration: byDeparture.length - byDuration.length,
    },
  };
}
