import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DEFAULT_LIST_URL = new URL('../../../data/curated-destinations.json', import.meta.url);

const curatedListSchema = z.object({
  description: z.string().optional(),
  destinations: z.array(z.string().trim().toUpperCase().length(3)).min(1),
});

/**
 * The static fallback list of popular destinations, deduplicated and sorted.
 */
export function loadCuratedDestinations(source: URL | string = DEFAULT_LIST_URL): string[] {
  const { destinations } = curatedListSchema.parse(JSON.parse(readFileSync(source, 'utf-8')));
  return uniqueSorted(destinations);
}

export function uniqueSorted(codes: Iterable<string>): string[] {
  return [...new Set(codes)].sort();
}
