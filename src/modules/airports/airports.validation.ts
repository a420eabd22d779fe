import { z } from 'zod';

export const airportParamsSchema = z.object({
  code: z.string().regex(/^[A-Za-z]{3}$/, 'Must be a 3-letter location code'),
});
