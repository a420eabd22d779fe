import type { FlightDirection } from '../../utils/constants.js';

export interface FlightEndpoint {
  iataCode: string;
  at?: string;
}

export interface Segment {
  carrierCode: string;
  departure: FlightEndpoint;
  arrival: FlightEndpoint;
  numberOfStops: number;
}

export interface Itinerary {
  duration?: string;
  segments: Segment[];
}

export interface FlightOffer {
  id: string;
  price: { total: number; currency: string };
  itineraries: Itinerary[];
  /** Which of the expanded origins produced this offer */
  searchOrigin?: string;
}

export interface SearchCriteria {
  readonly origin: string;
  readonly destination: string;
  readonly departureDate: string;
  readonly returnDate?: string;
  readonly maxStops: number;
  readonly minDepartureTimeOutbound?: string;
  readonly minDepartureTimeReturn?: string;
  readonly maxDurationHours: number;
  readonly nearbyAirportsRadiusKm: number;
  readonly direction: FlightDirection;
}

export interface MatchCandidate {
  destination: string;
  person1Flight: FlightOffer;
  person2Flight: FlightOffer;
  person1Price: number;
  person2Price: number;
  totalPrice: number;
  currency: string;
}

/**
 * Stable cache key. Field order is fixed and every field participates.
 */
export function criteriaKey(criteria: SearchCriteria): string {
  return [
    criteria.origin,
    criteria.destination,
    criteria.departureDate,
    criteria.returnDate ?? '',
    criteria.maxStops,
    criteria.minDepartureTimeOutbound ?? '',
    criteria.minDepartureTimeReturn ?? '',
    criteria.maxDurationHours,
    criteria.nearbyAirportsRadiusKm,
    criteria.direction,
  ].join('|');
}
