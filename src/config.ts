import { z } from 'zod';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warning', 'error', 'fatal'] as const;

// Largest delay setTimeout honours; anything above fires at once.
const MAX_TIMER_MS = 2_147_483_647;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const configSchema = z
  .object({
    DATABASE_URL: z.string().trim().min(1).optional(),
    STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(5_000),
    MAX_PAGE_SIZE: positiveInt(50),
    DEFAULT_PAGE_SIZE: positiveInt(20),
    PG_POOL_MAX: positiveInt(10),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .refine((env) => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
    message: 'DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE',
    path: ['DEFAULT_PAGE_SIZE'],
  });

export type Config = {
  databaseUrl?: string;
  storageTimeoutMs: number;
  maxPageSize: number;
  defaultPageSize: number;
  poolMax: number;
  logLevel: (typeof LOG_LEVELS)[number];
};

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

/** Reads settings from the environment. Blank variables count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }
  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${z.prettifyError(parsed.error)}`);
  }
  const data = parsed.data;
  const config: Config = {
    storageTimeoutMs: data.STORAGE_TIMEOUT_MS,
    maxPageSize: data.MAX_PAGE_SIZE,
    defaultPageSize: data.DEFAULT_PAGE_SIZE,
    poolMax: data.PG_POOL_MAX,
    logLevel: data.LOG_LEVEL,
  };
  if (data.DATABASE_URL) config.databaseUrl = data.DATABASE_URL;
  return config;
}

export function requireDatabaseUrl(config: Config): string {
  if (!config.databaseUrl) {
    throw new ConfigError('DATABASE_URL is required to start the server');
  }
  return config.databaseUrl;
}
