import { addDays, format, isBefore, isValid, parseISO, startOfDay } from 'date-fns';
import { describeError, isNotFoundError } from '../../utils/appError.js';
import { runPooled } from '../../utils/concurrency.js';
import {
  DestinationSource,
  INSPIRATION_WINDOW_DAYS,
  ProviderEnvironment,
  UNRELIABLE_DYNAMIC_ORIGINS,
} from '../../utils/constants.js';
import { logger } from '../../utils/logger.js';
import type { FlightDataProvider } from '../../providers/provider.types.js';
import { normalizeCode } from '../airports/airports.service.js';
import type { DestinationCache } from '../cache/searchCaches.js';
import { uniqueSorted } from './curatedDestinations.js';

export interface DiscoveryOptions {
  departureDate: string;
  /** false skips the provider entirely and goes straight to the curated list */
  dynamic: boolean;
  /** Hours; logged only, the retrieval filters enforce it */
  durationCeiling: number;
  nonStopOnly: boolean;
}

export interface DiscoveryRequest extends DiscoveryOptions {
  origin: string;
}

export interface CommonDiscoveryRequest extends DiscoveryOptions {
  origin1: string;
  origin2: string;
}

export interface DiscoveryOutcome {
  destinations: string[];
  source: DestinationSource;
}

export interface DestinationDiscoveryDeps {
  provider: FlightDataProvider;
  cache: DestinationCache;
  environment: ProviderEnvironment;
  curated: readonly string[];
  now?: () => Date;
}

interface DestinationStrategy {
  source: DestinationSource;
  applies(request: DiscoveryRequest): boolean;
  find(request: DiscoveryRequest): Promise<string[] | null>;
}

const CACHEABLE_SOURCES: ReadonlySet<DestinationSource> = new Set([
  DestinationSource.INSPIRATION,
  DestinationSource.DIRECT_ROUTES,
]);

export class DestinationDiscoveryService {
  private readonly strategies: DestinationStrategy[];
  private readonly curated: string[];
  private readonly now: () => Date;

  constructor(private readonly deps: DestinationDiscoveryDeps) {
    this.curated = uniqueSorted(deps.curated);
    this.now = deps.now ?? (() => new Date());
    if (this.curated.length === 0) {
      throw new Error('Curated destination list must not be empty');
    }

    // Tried in order; the first non-empty answer wins
    this.strategies = [
      {
        source: DestinationSource.CACHE,
        applies: () => deps.cache.enabled,
        find: (request) => deps.cache.get(request.origin),
      },
      {
        source: DestinationSource.INSPIRATION,
        applies: (request) => this.usesProvider(request),
        find: (request) => this.fromInspiration(request),
      },
      {
        source: DestinationSource.DIRECT_ROUTES,
        applies: (request) => this.usesProvider(request),
        find: (request) => this.fromDirectRoutes(request.origin),
      },
      {
        source: DestinationSource.CURATED,
        applies: () => true,
        find: async () => [...this.curated],
      },
    ];
  }

  async suggestDestinations(request: DiscoveryRequest): Promise<string[]> {
    const { destinations } = await this.suggestDestinationsWithSource(request);
    return destinations;
  }

  async suggestDestinationsWithSource(input: DiscoveryRequest): Promise<DiscoveryOutcome> {
    const request = { ...input, origin: normalizeCode(input.origin) };
    logger.info(
      `Determining destinations from ${request.origin} (dynamic: ${request.dynamic}, ` +
        `non-stop only: ${request.nonStopOnly}, max duration: ${request.durationCeiling || 'none'}h)`,
    );
    if (request.dynamic && this.isUnreliable(request.origin)) {
      logger.warn(`${request.origin} has no reliable inspiration data in the test environment, skipping the provider`);
    }

    for (const strategy of this.strategies) {
      if (!strategy.applies(request)) continue;

      let found: string[] | null;
      try {
        found = await strategy.find(request);
      } catch (error) {
        logger.warn(`Destination ${strategy.source} lookup failed for ${request.origin}: ${describeError(error)}`);
        continue;
      }
      if (!found || found.length === 0) continue;

      const destinations = uniqueSorted(found);
      if (CACHEABLE_SOURCES.has(strategy.source)) await this.remember(request.origin, destinations);

      logger.info(`Using ${destinations.length} ${strategy.source} destination(s) for ${request.origin}`);
      return { destinations, source: strategy.source };
    }

    // The curated strategy always answers
    return { destinations: [...this.curated], source: DestinationSource.CURATED };
  }

  /**
   * Destinations reachable from both origins. A side that only produced the
   * curated list (or failed) counts as empty; when both sides have real
   * results their intersection is used, falling back to the union.
   */
  async commonDestinations(request: CommonDiscoveryRequest): Promise<string[]> {
    const { origin1, origin2, ...options } = request;
    logger.info(`Finding common destinations from ${origin1} and ${origin2}`);

    if (options.dynamic && this.isUnreliable(origin1) && this.isUnreliable(origin2)) {
      logger.warn(`Neither ${origin1} nor ${origin2} has dynamic data here, using curated destinations`);
      return [...this.curated];
    }

    const [side1, side2] = await runPooled([
      () => this.suggestDestinationsWithSource({ ...options, origin: origin1 }),
      () => this.suggestDestinationsWithSource({ ...options, origin: origin2 }),
    ]);
    const dest1 = this.realDestinations(origin1, side1);
    const dest2 = this.realDestinations(origin2, side2);

    if (dest1.length === 0 && dest2.length === 0) {
      logger.warn('No dynamic destinations for either origin, using curated destinations');
      return [...this.curated];
    }
    if (dest1.length === 0) return dest2;
    if (dest2.length === 0) return dest1;

    const second = new Set(dest2);
    const common = dest1.filter((code) => second.has(code));
    if (common.length > 0) {
      logger.info(`Common destinations: ${common.length}`);
      return common;
    }

    const union = uniqueSorted([...dest1, ...dest2]);
    logger.warn(`No destinations in common, using the union of both origins (${union.length})`);
    return union;
  }

  // ── Strategies ──

  private async fromInspiration(request: DiscoveryRequest): Promise<string[] | null> {
    const departureDate = this.inspirationWindow(request.departureDate);
    const query = async (nonStop: boolean): Promise<string[]> => {
      const suggestions = await this.deps.provider.inspirationDestinations({
        origin: request.origin,
        departureDate,
        nonStop,
        oneWay: false,
      });
      return suggestions.map((s) => s.destination);
    };

    let found: string[] = [];
    try {
      found = await query(request.nonStopOnly);
    } catch (error) {
      if (!request.nonStopOnly || !isNotFoundError(error)) throw error;
      logger.debug(`No non-stop inspiration data for ${request.origin}: ${describeError(error)}`);
    }

    if (found.length === 0 && request.nonStopOnly) {
      logger.info(`Retrying inspiration search for ${request.origin} with connections allowed`);
      found = await query(false);
    }

    return found.length > 0 ? found : null;
  }

  private async fromDirectRoutes(origin: string): Promise<string[] | null> {
    const routes = await this.deps.provider.directDestinations(origin);
    return routes.length > 0 ? routes : null;
  }

  // ── Helpers ──

  /** `start,end` where start is the departure date or today, whichever is later */
  inspirationWindow(departureDate: string): string {
    const departure = parseISO(departureDate);
    if (!isValid(departure)) return departureDate;

    const today = startOfDay(this.now());
    const start = isBefore(departure, today) ? today : departure;
    const horizon = addDays(departure, INSPIRATION_WINDOW_DAYS);
    const end = isBefore(horizon, start) ? start : horizon;
    return `${format(start, 'yyyy-MM-dd')},${format(end, 'yyyy-MM-dd')}`;
  }

  private usesProvider(request: DiscoveryRequest): boolean {
    return request.dynamic && !this.isUnreliable(request.origin);
  }

  private isUnreliable(origin: string): boolean {
    return (
      this.deps.environment === ProviderEnvironment.TEST && UNRELIABLE_DYNAMIC_ORIGINS.includes(normalizeCode(origin))
    );
  }

  private realDestinations(origin: string, side: PromiseSettledResult<DiscoveryOutcome>): string[] {
    if (side.status === 'rejected') {
      logger.warn(`Destination discovery failed for ${origin}: ${describeError(side.reason)}`);
      return [];
    }
    return side.value.source === DestinationSource.CURATED ? [] : side.value.destinations;
  }

  private async remember(origin: string, destinations: string[]): Promise<void> {
    try {
      await this.deps.cache.put(origin, destinations);
    } catch (error) {
      logger.warn(`Could not cache destinations for ${origin}: ${describeError(error)}`);
    }
  }
}
