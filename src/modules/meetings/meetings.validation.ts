import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { FlightDirection } from '../../utils/constants.js';

const iataCode = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{3}$/, 'Must be a 3-letter IATA code');

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be a YYYY-MM-DD date')
  .refine((value) => isValid(parseISO(value)), 'Must be a real calendar date');

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Must be a HH:MM time');

/** A number for both travelers, or one per traveler */
const perTraveler = (value: z.ZodNumber) =>
  z
    .union([value, z.object({ person1: value, person2: value })])
    .transform((v) => (typeof v === 'number' ? { person1: v, person2: v } : v));

export const meetingSearchSchema = z
  .object({
    origins: z.object({
      person1: iataCode,
      person2: iataCode,
    }),
    outboundDate: isoDate,
    returnDate: isoDate.optional(),
    direction: z.nativeEnum(FlightDirection).default(FlightDirection.ROUND_TRIP),
    maxPrice: perTraveler(z.number().positive()),
    maxStops: perTraveler(z.number().int().min(0)).default(0),
    maxDurationHours: perTraveler(z.number().min(0)).default(0),
    toleranceHours: z.number().min(0).default(3),
    minDepartureTimeOutbound: clockTime.optional(),
    minDepartureTimeReturn: clockTime.optional(),
    nearbyAirportsRadiusKm: z.number().min(0).default(0),
    useDynamicDestinations: z.boolean().default(true),
    maxDestinations: z.number().int().min(0).default(50),
    destinations: z.array(z.string().min(1)).optional(),
  })
  .superRefine((request, ctx) => {
    if (request.direction !== FlightDirection.OUTBOUND_ONLY && !request.returnDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['returnDate'],
        message: `returnDate is required for ${request.direction} searches`,
      });
    }
    if (request.returnDate && request.returnDate < request.outboundDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['returnDate'],
        message: 'returnDate must not be before outboundDate',
      });
    }
  });

export type MeetingSearchRequest = z.infer<typeof meetingSearchSchema>;
export type MeetingSearchInput = z.input<typeof meetingSearchSchema>;
