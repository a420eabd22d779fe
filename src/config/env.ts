import { z } from 'zod';
import dotenv from 'dotenv';
import { CacheBackend, ProviderEnvironment } from '../utils/constants.js';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5000),
  API_PREFIX: z.string().default('/api/v1'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Amadeus Self-Service API
  AMADEUS_API_KEY: z.string().min(1, 'AMADEUS_API_KEY is required'),
  AMADEUS_API_SECRET: z.string().min(1, 'AMADEUS_API_SECRET is required'),
  AMADEUS_ENVIRONMENT: z
    .enum(['test', 'production', 'live'])
    .default('test')
    .transform((value) => (value === 'test' ? ProviderEnvironment.TEST : ProviderEnvironment.PRODUCTION)),
  AMADEUS_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Caches
  CACHE_BACKEND: z.nativeEnum(CacheBackend).default(CacheBackend.FILE),
  CACHE_DIR: z.string().default('data/cache'),
  MONGODB_URI: z.string().optional(),
  DESTINATION_CACHE_EXPIRATION_DAYS: z.coerce.number().int().min(0).default(30),
  USE_FLIGHT_CACHE: booleanFlag.default('true'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const envData = parsed.data;

if (envData.CACHE_BACKEND === CacheBackend.MONGO && !envData.MONGODB_URI) {
  console.error('Invalid environment variables:');
  console.error('- MONGODB_URI is required when CACHE_BACKEND=mongo');
  process.exit(1);
}

export const env = envData;
export type Env = typeof envData;
