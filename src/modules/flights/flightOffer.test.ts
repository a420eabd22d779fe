import { describe, expect, it } from 'vitest';
import { FlightDirection } from '../../utils/constants.js';
import { itinerary, offer } from '../../test/fixtures.js';
import { carrierSet, itineraryStops, meetingTime, offerStops, outboundLeg, returnLeg } from './flightOffer.js';

const outbound = itinerary([
  { from: 'TLV', to: 'ATH', departAt: '2026-12-04T06:00:00', arriveAt: '2026-12-04T08:30:00', carrier: 'A3' },
  { from: 'ATH', to: 'FCO', departAt: '2026-12-04T10:00:00', arriveAt: '2026-12-04T11:45:00', carrier: 'AZ' },
]);
const inbound = itinerary([
  { from: 'FCO', to: 'TLV', departAt: '2026-12-07T18:00:00', arriveAt: '2026-12-07T22:30:00', carrier: 'LY' },
]);
const roundTrip = offer('rt', 310, [outbound, inbound]);

describe('stop counting', () => {
  it('counts connections from the segment count', () => {
    expect(itineraryStops(outbound)).toBe(1);
    expect(itineraryStops(inbound)).toBe(0);
  });

  it('uses a technical stop when it exceeds the connections', () => {
    expect(itineraryStops(itinerary([{ from: 'MAD', to: 'BOG', stops: 1 }]))).toBe(1);
  });

  it('never counts fewer stops than connections', () => {
    for (let n = 1; n <= 5; n++) {
      const legs = Array.from({ length: n }, () => ({ from: 'AAA', to: 'BBB' }));
      expect(itineraryStops(itinerary(legs))).toBeGreaterThanOrEqual(n - 1);
    }
  });

  it('takes the worst itinerary of an offer', () => {
    expect(offerStops(roundTrip)).toBe(1);
  });
});

describe('legs and meeting times', () => {
  it('picks legs by direction', () => {
    expect(outboundLeg(roundTrip, FlightDirection.ROUND_TRIP)).toBe(outbound);
    expect(returnLeg(roundTrip, FlightDirection.ROUND_TRIP)).toBe(inbound);
    expect(returnLeg(roundTrip, FlightDirection.OUTBOUND_ONLY)).toBeUndefined();

    const oneWayBack = offer('ret', 90, [inbound]);
    expect(outboundLeg(oneWayBack, FlightDirection.RETURN_ONLY)).toBeUndefined();
    expect(returnLeg(oneWayBack, FlightDirection.RETURN_ONLY)).toBe(inbound);
  });

  it('meets on arrival for outbound travel', () => {
    expect(meetingTime(roundTrip, FlightDirection.ROUND_TRIP)).toBe('2026-12-04T11:45:00');
    expect(meetingTime(roundTrip, FlightDirection.OUTBOUND_ONLY)).toBe('2026-12-04T11:45:00');
  });

  it('meets on departure for return-only travel', () => {
    expect(meetingTime(offer('ret', 90, [inbound]), FlightDirection.RETURN_ONLY)).toBe('2026-12-07T18:00:00');
  });
});

describe('carrierSet', () => {
  it('is sorted and unique across itineraries', () => {
    expect(carrierSet(roundTrip)).toEqual(['A3', 'AZ', 'LY']);
  });
});
