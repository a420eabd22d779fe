import type { FlightDirection } from '../utils/constants.js';
import type { FlightOffer } from '../modules/flights/flights.types.js';

export interface OfferQuery {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  /** Round-trip queries send `returnDate`; one-way directions omit it */
  direction: FlightDirection;
}

export interface InspirationQuery {
  origin: string;
  /** `YYYY-MM-DD` or a `YYYY-MM-DD,YYYY-MM-DD` range */
  departureDate: string;
  nonStop: boolean;
  oneWay: boolean;
}

export interface DestinationSuggestion {
  destination: string;
  price?: number;
  departureDate?: string;
  returnDate?: string;
}

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface AirportLocation extends GeoPoint {
  iataCode: string;
  subType: string;
  name?: string;
}

/**
 * The external flight data source. Every method may reject with a provider
 * `AppError`; callers decide how to degrade.
 */
export interface FlightDataProvider {
  readonly name: string;
  searchOffers(query: OfferQuery): Promise<FlightOffer[]>;
  inspirationDestinations(query: InspirationQuery): Promise<DestinationSuggestion[]>;
  directDestinations(origin: string): Promise<string[]>;
  locateAirport(code: string): Promise<GeoPoint | null>;
  nearbyAirports(point: GeoPoint, radiusKm: number): Promise<AirportLocation[]>;
}
