/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3030),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Redis
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().default(6379),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().default(3),
  REDIS_TLS: z.enum(['true', 'false', '1', '0', '']).default('').transform(v => v === 'true' || v === '1'),

  // Roster storage: the whole collection lives under one key
  ROSTER_STATE_KEY: z.string().min(1).default('roster:state'),

  // Event defaults for a chat seen for the first time
  DEFAULT_EVENT_TIME: z.string().regex(/^\d{2}:\d{2}-\d{2}:\d{2}$/).default('20:00-22:00'),
  DEFAULT_VENUE: z.string().min(1).default('Horizon Arena'),

  // Chat platform API (admin lookups)
  CHAT_API_URL: z.string().url().default('http://127.0.0.1:8081'),
  CHAT_API_KEY: z.string().optional(),
  CHAT_API_TIMEOUT_MS: z.coerce.number().default(5_000),
  ADMIN_CACHE_TTL_MS: z.coerce.number().default(30_000),
  ADMIN_CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).default(10_000),

  // Limits
  RATE_LIMIT_MESSAGES_PER_MINUTE: z.coerce.number().default(30),

  // Security
  CORS_ORIGINS: z.string().default('http://localhost:3000').transform(s => s.split(',').map(o => o.trim())),
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

export const isDev = config.NODE_ENV === 'development';
