import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DEFAULT_TABLE_URL = new URL('../../../data/airport-aliases.json', import.meta.url);

const stationSchema = z.object({
  code: z.string().length(3),
  name: z.string().optional(),
  type: z.enum(['rail', 'bus', 'ferry']),
  airport: z.string().length(3).optional(),
});

export const airportTableSchema = z.object({
  stations: z.array(stationSchema),
});

export type AirportTable = z.infer<typeof airportTableSchema>;
export type StationType = z.infer<typeof stationSchema>['type'];

export interface AirportDescription {
  code: string;
  resolved: string;
  isAlias: boolean;
  isValid: boolean;
  type: StationType | 'airport';
  stationName?: string;
}

export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export function loadAirportTable(source: URL | string = DEFAULT_TABLE_URL): AirportTable {
  return airportTableSchema.parse(JSON.parse(readFileSync(source, 'utf-8')));
}

/**
 * Maps non-airport location codes (rail stations and the like) onto the
 * airport that serves them. Unknown codes pass through untouched: the flight
 * search is the authority on whether a code actually has service.
 */
export class AirportResolver {
  private readonly aliases = new Map<string, string>();
  private readonly stations = new Map<string, { type: StationType; name?: string }>();

  constructor(table: AirportTable) {
    for (const station of table.stations) {
      const code = normalizeCode(station.code);
      this.stations.set(code, { type: station.type, name: station.name });
      if (station.airport) this.aliases.set(code, normalizeCode(station.airport));
    }

    // resolve() must be idempotent, so no alias may point at another alias
    for (const [source, target] of this.aliases) {
      if (this.aliases.has(target)) {
        throw new Error(`Airport alias ${source} -> ${target} chains into another alias`);
      }
    }
  }

  resolve(code: string): string {
    const normalized = normalizeCode(code);
    return this.aliases.get(normalized) ?? normalized;
  }

  isAlias(code: string): boolean {
    return this.aliases.has(normalizeCode(code));
  }

  isValidAirport(code: string): boolean {
    const normalized = normalizeCode(code);
    if (this.stations.has(normalized)) return false;
    return !this.aliases.has(normalized);
  }

  describe(code: string): AirportDescription {
    const normalized = normalizeCode(code);
    const station = this.stations.get(normalized);
    return {
      code: normalized,
      resolved: this.resolve(normalized),
      isAlias: this.isAlias(normalized),
      isValid: this.isValidAirport(normalized),
      type: station?.type ?? 'airport',
      stationName: station?.name,
    };
  }
}
