import { FlightDirection } from '../../utils/constants.js';
import { parseDurationHours } from '../../utils/time.js';
import type { FlightOffer, Itinerary } from './flights.types.js';

// ── Stops ──

/**
 * Stops within one itinerary: connections implied by the segment count, or a
 * segment's own technical stops, whichever is larger.
 */
export function itineraryStops(itinerary: Itinerary): number {
  const connections = Math.max(0, itinerary.segments.length - 1);
  const technical = itinerary.segments.reduce((max, seg) => Math.max(max, seg.numberOfStops), 0);
  return Math.max(connections, technical);
}

export function offerStops(offer: FlightOffer): number {
  return offer.itineraries.reduce((max, itinerary) => Math.max(max, itineraryStops(itinerary)), 0);
}

// ── Legs ──

/** The leg flying towards the destination, if the direction has one. */
export function outboundLeg(offer: FlightOffer, direction: FlightDirection): Itinerary | undefined {
  if (direction === FlightDirection.RETURN_ONLY) return undefined;
  return offer.itineraries[0];
}

/** The leg departing the destination, if the direction has one. */
export function returnLeg(offer: FlightOffer, direction: FlightDirection): Itinerary | undefined {
  switch (direction) {
    case FlightDirection.ROUND_TRIP:
      return offer.itineraries[1];
    case FlightDirection.RETURN_ONLY:
      return offer.itineraries[0];
    default:
      return undefined;
  }
}

export function legDurationHours(itinerary: Itinerary): number | undefined {
  return parseDurationHours(itinerary.duration);
}

export function firstDeparture(itinerary: Itinerary | undefined): string | undefined {
  return itinerary?.segments[0]?.departure.at;
}

export function lastArrival(itinerary: Itinerary | undefined): string | undefined {
  const segments = itinerary?.segments;
  if (!segments || segments.length === 0) return undefined;
  return segments[segments.length - 1].arrival.at;
}

// ── Meeting Times ──

export function destinationArrival(offer: FlightOffer, direction: FlightDirection): string | undefined {
  return lastArrival(outboundLeg(offer, direction));
}

export function destinationDeparture(offer: FlightOffer, direction: FlightDirection): string | undefined {
  return firstDeparture(returnLeg(offer, direction));
}

/**
 * The timestamp two travelers are compared on: arrival at the destination, or
 * departure from it for return-only searches.
 */
export function meetingTime(offer: FlightOffer, direction: FlightDirection): string | undefined {
  return direction === FlightDirection.RETURN_ONLY
    ? destinationDeparture(offer, direction)
    : destinationArrival(offer, direction);
}

export function carrierSet(offer: FlightOffer): string[] {
  const codes = new Set<string>();
  for (const itinerary of offer.itineraries) {
    for (const segment of itinerary.segments) {
      if (segment.carrierCode) codes.add(segment.carrierCode);
    }
  }
  return [...codes].sort();
}
