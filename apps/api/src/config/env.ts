/**
 * Service configuration, read once from the environment (and `.env` via
 * dotenv in app.ts).
 *
 *   PORT                   HTTP port (default 3001)
 *   DATABASE_URL           PostgreSQL connection; in-memory store when unset
 *   INGEST_API_KEY         shared secret the device sends; ingest refused when unset
 *   MAX_SERIES_LENGTH      retained samples per session, 0 = unbounded (default 0)
 *   END_SESSION_SETTLE_MS  pause after an end event (default 100)
 *   DEV_MODE               authorize resistance control for every caller
 *   CORS_ORIGIN            allowed dashboard origin (default *)
 */

import { z } from 'zod';

const flag = z
  .string()
  .default('false')
  .transform((v) => ['true', '1', 'yes'].includes(v.trim().toLowerCase()));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  DATABASE_URL: z.string().url().optional(),
  INGEST_API_KEY: z.string().min(1).optional(),
  MAX_SERIES_LENGTH: z.coerce.number().int().min(0).default(0),
  END_SESSION_SETTLE_MS: z.coerce.number().int().min(0).default(100),
  DEV_MODE: flag,
  CORS_ORIGIN: z.string().default('*'),
});

export interface AppConfig {
  port: number;
  databaseUrl: string | null;
  ingestApiKey: string | null;
  maxSeriesLength: number;
  endSessionSettleMs: number;
  devMode: boolean;
  corsOrigin: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL ?? null,
    ingestApiKey: parsed.INGEST_API_KEY ?? null,
    maxSeriesLength: parsed.MAX_SERIES_LENGTH,
    endSessionSettleMs: parsed.END_SESSION_SETTLE_MS,
    devMode: parsed.DEV_MODE,
    corsOrigin: parsed.CORS_ORIGIN,
  };
}
