import { config } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_LIMITS, PATHS, SITE } from './shared/constants.js';

// Load .env file before validation
config();

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

/**
 * Schema for all environment variables consumed by the runner.
 * Every variable has a default, so an empty environment is valid; malformed
 * values cause a hard failure at startup.
 */
export const envSchema = z
  .object({
    // ---------- General ----------
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    // ---------- Control API ----------
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('127.0.0.1'),

    // ---------- Remote site ----------
    SITE_ROOT_URL: z.string().url().default(SITE.ROOT_URL),
    /** Login endpoint, relative to SITE_ROOT_URL */
    LOGIN_PATH: z.string().default(SITE.LOGIN_PATH),
    REQUEST_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_LIMITS.REQUEST_TIMEOUT_MS),

    // ---------- Files ----------
    SESSION_FILE: z.string().default(PATHS.SESSION_FILE),
    AUDIT_LOG_FILE: z.string().default(PATHS.AUDIT_LOG_FILE),
    ERROR_LOG_DIR: z.string().default('.'),

    // ---------- Wagering ----------
    MAX_BET_PRICE: z.coerce.number().positive().default(DEFAULT_LIMITS.MAX_BET_PRICE),
    DELAY_MIN_SECONDS: z.coerce
      .number()
      .nonnegative()
      .default(DEFAULT_LIMITS.DELAY_MIN_SECONDS),
    DELAY_MAX_SECONDS: z.coerce
      .number()
      .nonnegative()
      .default(DEFAULT_LIMITS.DELAY_MAX_SECONDS),
    PAUSE_POLL_MS: z.coerce.number().int().positive().default(DEFAULT_LIMITS.PAUSE_POLL_MS),

    // ---------- Authentication ----------
    LOGIN_ATTEMPTS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_LIMITS.LOGIN_ATTEMPTS),
    /** Re-authenticate and retry the batch once when the login expires mid-run */
    REAUTH_ON_SESSION_EXPIRY: booleanFlag,
  })
  .refine((v) => v.DELAY_MIN_SECONDS <= v.DELAY_MAX_SECONDS, {
    message: 'DELAY_MIN_SECONDS must not exceed DELAY_MAX_SECONDS',
    path: ['DELAY_MIN_SECONDS'],
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment-like record. Exposed separately from `env` so tests
 * can validate arbitrary inputs without touching process.env.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    // eslint-disable-next-line no-console
    console.error(
      `\n[env] Invalid environment variables:\n${formatted}\n`,
    );
    throw new Error('Environment validation failed. See above for details.');
  }

  return result.data;
}

/**
 * Typed, validated environment variables.
 * Importing this module will eagerly parse process.env and throw
 * at startup if any variable is malformed.
 */
export const env: Env = parseEnv(process.env);
