import { z } from 'zod';

const numeric = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value), { message: 'Expected a numeric value' });

// ── Auth ──

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.coerce.number().positive(),
});

// ── Flight Offers Search ──

const endpointSchema = z.object({
  iataCode: z.string().min(1),
  at: z.string().optional(),
});

export const segmentSchema = z.object({
  carrierCode: z.string().default(''),
  departure: endpointSchema,
  arrival: endpointSchema,
  numberOfStops: z.coerce.number().int().nonnegative().default(0),
});

export const itinerarySchema = z.object({
  duration: z.string().optional(),
  segments: z.array(segmentSchema).min(1),
});

export const flightOfferSchema = z.object({
  id: z.coerce.string(),
  price: z.object({
    total: numeric,
    currency: z.string().default('EUR'),
  }),
  itineraries: z.array(itinerarySchema).min(1),
});

export type RawFlightOffer = z.infer<typeof flightOfferSchema>;

// ── Flight Inspiration Search ──

export const inspirationItemSchema = z.object({
  destination: z.string().min(1),
  departureDate: z.string().optional(),
  returnDate: z.string().optional(),
  price: z.object({ total: numeric }).optional(),
});

// ── Airport Routes ──

export const directDestinationSchema = z.object({
  iataCode: z.string().min(1),
  name: z.string().optional(),
});

// ── Reference Data ──

export const locationSchema = z.object({
  iataCode: z.string().min(1),
  subType: z.string().default('AIRPORT'),
  name: z.string().optional(),
  geoCode: z.object({
    latitude: z.coerce.number(),
    longitude: z.coerce.number(),
  }),
});

// ── Envelope & Errors ──

export const dataEnvelopeSchema = z.object({
  data: z.array(z.unknown()).default([]),
});

export const errorBodySchema = z.object({
  errors: z
    .array(
      z.object({
        status: z.coerce.number().optional(),
        code: z.coerce.number().optional(),
        title: z.string().optional(),
        detail: z.string().optional(),
      }),
    )
    .default([]),
});
