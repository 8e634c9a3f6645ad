import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

  DATABASE_URL: z.string().url().optional(),
  DB_POOL_SIZE: z.coerce.number().int().min(1).max(100).default(10),

  CLASSIFIER_MODEL_PATH: z.string().min(1).optional(),
  CLASSIFIER_WEIGHT: z.coerce.number().min(0).max(1).default(0.3),
  MATCH_MODE: z.enum(['substring', 'word']).default('substring'),
  APPLY_SEVERITY_QUALIFIERS: booleanFlag.default('true'),

  MAX_SENTENCES: z.coerce.number().int().positive().default(5000),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(16 * 1024 * 1024),
  MIN_TEXT_LENGTH: z.coerce.number().int().nonnegative().default(50),

  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Parses configuration from an environment map. Empty strings count as unset. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = configSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
    );
  }
  return result.data;
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
