import { z } from 'zod';

/**
 * Key-value store behind the destination and flight caches. Implementations
 * treat unreadable or malformed entries as misses and never throw from get().
 */
export interface CacheStore<T> {
  get(key: string): Promise<T | null>;
  put(key: string, value: T): Promise<void>;
}

// ── Entries ──

export const destinationCacheEntrySchema = z.object({
  origin: z.string(),
  destinations: z.array(z.string()),
  cachedAt: z.string(),
  count: z.number().int().nonnegative(),
});

export type DestinationCacheEntry = z.infer<typeof destinationCacheEntrySchema>;

const endpointSchema = z.object({ iataCode: z.string(), at: z.string().optional() });

export const flightCacheEntrySchema = z.object({
  key: z.string(),
  cachedAt: z.string(),
  offers: z.array(
    z.object({
      id: z.string(),
      price: z.object({ total: z.number(), currency: z.string() }),
      searchOrigin: z.string().optional(),
      itineraries: z.array(
        z.object({
          duration: z.string().optional(),
          segments: z.array(
            z.object({
              carrierCode: z.string(),
              departure: endpointSchema,
              arrival: endpointSchema,
              numberOfStops: z.number(),
            }),
          ),
        }),
      ),
    }),
  ),
});

export type FlightCacheEntry = z.infer<typeof flightCacheEntrySchema>;
