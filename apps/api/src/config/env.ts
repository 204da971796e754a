import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../common/config.error';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  APP_VERSION: z.string().default('1.0.0'),
  CORS_ORIGINS: z.string().default('http://localhost:3000'),

  SWYFTX_API_KEY: z.string().trim().min(1, 'SWYFTX_API_KEY is required'),
  SWYFTX_API_URL: z.string().url().default('https://api.swyftx.com.au'),

  COINGECKO_API_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
  // empty string in docker-compose = not set
  COINGECKO_API_KEY: z.preprocess((v) => (v === '' ? undefined : v), z.string().min(1).optional()),

  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PORTFOLIO_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(60),
  // AUD -> USD, approximate on purpose
  SECONDARY_CURRENCY_RATE: z.coerce.number().positive().default(0.65),

  CACHE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
});

export type Env = z.infer<typeof envSchema>;

export const APP_ENV = Symbol('APP_ENV');

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}
