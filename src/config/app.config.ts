import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { booleanFromEnv, validateConfig } from './validate-config';

const AppEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  APP_PORT: z.coerce.number().int().positive().default(3000),
  API_PREFIX: z.string().min(1).default('api'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  PUBLIC_URL: z.string().url().default('https://mi-aplicacion.onrender.com'),
  RESULTS_LIMIT: z.coerce.number().int().min(1).max(50).default(10),
  SEARCH_RADIUS_KM: z.coerce.number().positive().default(2),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(10000),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(100),
  ENABLE_RATE_LIMITING: booleanFromEnv.optional(),
});

export type AppConfig = {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  apiPrefix: string;
  logLevel: string;
  publicUrl: string;
  resultsLimit: number;
  searchRadiusKm: number;
  cacheTtlSeconds: number;
  cacheMaxEntries: number;
  throttleLimit: number;
};

export default registerAs<AppConfig>('app', () => {
  const env = validateConfig(AppEnvSchema, process.env);

  // Tests run with a much higher limit unless a suite opts into real limits
  const relaxThrottling =
    env.NODE_ENV === 'test' && env.ENABLE_RATE_LIMITING !== true;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.APP_PORT,
    apiPrefix: env.API_PREFIX,
    logLevel: env.LOG_LEVEL,
    publicUrl: env.PUBLIC_URL,
    resultsLimit: env.RESULTS_LIMIT,
    searchRadiusKm: env.SEARCH_RADIUS_KM,
    cacheTtlSeconds: env.CACHE_TTL_SECONDS,
    cacheMaxEntries: env.CACHE_MAX_ENTRIES,
    throttleLimit: relaxThrottling ? 10000 : env.RATE_LIMIT_PER_MINUTE,
  };
});
