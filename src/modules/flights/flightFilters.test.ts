import { describe, expect, it } from 'vitest';
import { FlightDirection } from '../../utils/constants.js';
import { itinerary, offer } from '../../test/fixtures.js';
import {
  FILTER_POLICY,
  applyFilters,
  meetsDepartureTimes,
  withinDurationLimit,
  withinStopLimit,
} from './flightFilters.js';
import type { SearchCriteria } from './flights.types.js';

const criteria = (overrides: Partial<SearchCriteria> = {}): SearchCriteria => ({
  origin: 'BRU',
  destination: 'LIS',
  departureDate: '2026-12-04',
  returnDate: '2026-12-07',
  maxStops: 0,
  maxDurationHours: 0,
  nearbyAirportsRadiusKm: 0,
  direction: FlightDirection.ROUND_TRIP,
  ...overrides,
});

const nonStop = offer('direct', 120, [
  itinerary([{ from: 'BRU', to: 'LIS', departAt: '2026-12-04T07:30:00', arriveAt: '2026-12-04T09:40:00' }], 'PT3H10M'),
  itinerary([{ from: 'LIS', to: 'BRU', departAt: '2026-12-07T17:00:00', arriveAt: '2026-12-07T20:55:00' }], 'PT2H55M'),
]);

const oneStop = offer('via-mad', 95, [
  itinerary(
    [
      { from: 'BRU', to: 'MAD', departAt: '2026-12-04T06:00:00', arriveAt: '2026-12-04T08:20:00' },
      { from: 'MAD', to: 'LIS', departAt: '2026-12-04T10:00:00', arriveAt: '2026-12-04T10:15:00' },
    ],
    'PT5H15M',
  ),
  itinerary([{ from: 'LIS', to: 'BRU', departAt: '2026-12-07T12:00:00', arriveAt: '2026-12-07T15:55:00' }], 'PT2H55M'),
]);

describe('FILTER_POLICY', () => {
  it('fails open for filters and closed for time matching', () => {
    expect(FILTER_POLICY).toEqual({
      stops: 'fail-closed',
      departureTime: 'fail-open',
      duration: 'fail-open',
      timeMatching: 'fail-closed',
    });
  });
});

describe('withinStopLimit', () => {
  it('allows only non-stop offers at a ceiling of 0', () => {
    expect(withinStopLimit(nonStop, 0)).toBe(true);
    expect(withinStopLimit(oneStop, 0)).toBe(false);
  });

  it('allows connections up to the ceiling', () => {
    expect(withinStopLimit(oneStop, 1)).toBe(true);
  });
});

describe('meetsDepartureTimes', () => {
  it('checks the outbound minimum against the first departure', () => {
    expect(meetsDepartureTimes(nonStop, criteria({ minDepartureTimeOutbound: '07:00' }))).toBe(true);
    expect(meetsDepartureTimes(oneStop, criteria({ minDepartureTimeOutbound: '07:00' }))).toBe(false);
  });

  it('checks the return minimum against the return leg', () => {
    expect(meetsDepartureTimes(nonStop, criteria({ minDepartureTimeReturn: '15:00' }))).toBe(true);
    expect(meetsDepartureTimes(oneStop, criteria({ minDepartureTimeReturn: '15:00' }))).toBe(false);
  });

  it('ignores the return minimum for outbound-only searches', () => {
    const search = criteria({ direction: FlightDirection.OUTBOUND_ONLY, minDepartureTimeReturn: '23:00' });
    expect(meetsDepartureTimes(nonStop, search)).toBe(true);
  });

  it('keeps offers without a departure timestamp', () => {
    const undated = offer('undated', 80, [itinerary([{ from: 'BRU', to: 'LIS' }])]);
    expect(meetsDepartureTimes(undated, criteria({ minDepartureTimeOutbound: '09:00' }))).toBe(true);
  });

  it('treats a malformed minimum as no constraint', () => {
    expect(meetsDepartureTimes(oneStop, criteria({ minDepartureTimeOutbound: '7am' }))).toBe(true);
  });
});

describe('withinDurationLimit', () => {
  it('treats 0 as no limit', () => {
    expect(withinDurationLimit(oneStop, criteria())).toBe(true);
  });

  it('rejects offers with any relevant leg over the limit', () => {
    expect(withinDurationLimit(nonStop, criteria({ maxDurationHours: 4 }))).toBe(true);
    expect(withinDurationLimit(oneStop, criteria({ maxDurationHours: 4 }))).toBe(false);
  });

  it('keeps offers whose duration cannot be parsed', () => {
    const odd = offer('odd', 70, [itinerary([{ from: 'BRU', to: 'LIS' }], 'about 3 hours')]);
    expect(withinDurationLimit(odd, criteria({ maxDurationHours: 1 }))).toBe(true);
  });
});

describe('applyFilters', () => {
  it('reports how many offers each filter removed', () => {
    const undated = offer('long', 60, [itinerary([{ from: 'BRU', to: 'LIS' }], 'PT9H')]);
    const outcome = applyFilters(
      [nonStop, oneStop, undated],
      criteria({ maxStops: 0, minDepartureTimeOutbound: '07:00', maxDurationHours: 4 }),
    );

    expect(outcome.offers.map((o) => o.id)).toEqual(['direct']);
    expect(outcome.removed).toEqual({ stops: 1, departureTime: 0, duration: 1 });
  });
});
