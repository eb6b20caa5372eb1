// Environment validation using Zod
import 'dotenv/config';
import { z } from 'zod';

export const TICKETMASTER_EVENTS_URL = 'https://app.ticketmaster.com/discovery/v2/events.json';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().positive().default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Swagger/metadata
  SWAGGER_TITLE: z.string().default('City Events Service'),
  SWAGGER_VERSION: z.string().default('1.0.0'),

  // Upstream
  TICKETMASTER_BASE_URL: z.string().url().default(TICKETMASTER_EVENTS_URL),

  // Comma-separated list of allowed origins, '*' allows any
  CORS_ORIGINS: z.string().default('*'),
});

export type AppConfig = z.infer<typeof EnvSchema>;

// Exposed on the app instance by createApp
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // Logger is not available yet: it is configured from this result.
    // eslint-disable-next-line no-console
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('ENV validation failed');
  }
  return parsed.data;
}

export function defaultLogLevel(cfg: Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL'>): string {
  if (cfg.LOG_LEVEL) return cfg.LOG_LEVEL;
  if (cfg.NODE_ENV === 'test') return 'silent';
  return cfg.NODE_ENV === 'production' ? 'info' : 'debug';
}

export function corsOrigins(cfg: Pick<AppConfig, 'CORS_ORIGINS'>): '*' | Set<string> {
  const origins = cfg.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);
  if (origins.length === 0 || origins.includes('*')) return '*';
  return new Set(origins);
}

export const config = loadConfig(process.env);
