// ── Flight Direction ──
export enum FlightDirection {
  OUTBOUND_ONLY = 'outbound-only',
  RETURN_ONLY = 'return-only',
  ROUND_TRIP = 'round-trip',
}

export function includesOutbound(direction: FlightDirection): boolean {
  return direction !== FlightDirection.RETURN_ONLY;
}

export function includesReturn(direction: FlightDirection): boolean {
  return direction !== FlightDirection.OUTBOUND_ONLY;
}

// ── Cache Backend ──
export enum CacheBackend {
  FILE = 'file',
  MONGO = 'mongo',
  MEMORY = 'memory',
}

// ── Provider Environment ──
export enum ProviderEnvironment {
  TEST = 'test',
  PRODUCTION = 'production',
}

// ── Destination Source ──
export enum DestinationSource {
  CACHE = 'cache',
  INSPIRATION = 'inspiration',
  DIRECT_ROUTES = 'direct-routes',
  CURATED = 'curated',
}

// ── Search Limits ──

// Dual-origin discovery and dual-traveler retrieval run two tasks at a time
export const PAIR_CONCURRENCY = 2;

export const INSPIRATION_WINDOW_DAYS = 90;

// Max offers requested per flight-offers query
export const MAX_OFFERS_PER_QUERY = 250;

// Origins the provider's test environment has no inspiration data for
export const UNRELIABLE_DYNAMIC_ORIGINS: readonly string[] = ['TLV', 'ALC'];

export const DEFAULT_CURRENCY = 'EUR';
