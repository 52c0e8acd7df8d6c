import path from 'node:path';

import { z } from 'zod';

const intFromString = (fallback: string, min: number) =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => parseInt(val, 10))
    .pipe(z.number().int().min(min));

const envSchema = z.object({
  LKR_RATES_BULK_WINDOW_DAYS: intFromString('730', 1),
  LKR_RATES_CBSL_LOOKBACK_DAYS: intFromString('7', 0),
  LKR_RATES_DATA_DIR: z.string().min(1).or(z.undefined()),
  LKR_RATES_TIMEZONE: z
    .string()
    .default('Asia/Colombo')
    .refine(isKnownTimeZone, { message: 'Unknown IANA time zone' }),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next access re-reads process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Get the data directory path for the rates database.
 *
 * Priority:
 * 1. LKR_RATES_DATA_DIR environment variable (if set)
 * 2. process.cwd() + '/data' (default)
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.LKR_RATES_DATA_DIR ?? path.join(process.cwd(), 'data');
}

export function getDatabasePath(): string {
  return path.join(getDataDirectory(), 'exchange-rates.db');
}

/**
 * Time zone that decides which calendar date is "today" for live bank rates.
 */
export function getTimeZone(): string {
  return validateEnv().LKR_RATES_TIMEZONE;
}

/**
 * Trailing window fetched once when the central bank store is empty.
 */
export function getBulkWindowDays(): number {
  return validateEnv().LKR_RATES_BULK_WINDOW_DAYS;
}

/**
 * Days before the requested date included in a single-date central bank lookup.
 */
export function getCbslLookbackDays(): number {
  return validateEnv().LKR_RATES_CBSL_LOOKBACK_DAYS;
}
