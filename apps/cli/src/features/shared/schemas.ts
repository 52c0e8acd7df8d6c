import { CalendarDateSchema } from '@lkr-rates/core';
import { PROVIDER_NAMES } from '@lkr-rates/exchange-rates';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

const CommonFlagsSchema = JsonFlagSchema.extend(VerboseFlagSchema.shape);

export const ProviderOptionSchema = z.object({
  provider: z
    .enum(PROVIDER_NAMES, {
      errorMap: () => ({ message: `Unknown provider. Use one of: ${PROVIDER_NAMES.join(', ')}` }),
    })
    .default('cbsl'),
});

export const DateArgumentSchema = z.string().trim().pipe(CalendarDateSchema);

const positiveInt = (label: string) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be a whole number`)
    .positive(`${label} must be positive`);

/**
 * rate <date>
 */
export const RateCommandInputSchema = z
  .object({ date: DateArgumentSchema })
  .extend(ProviderOptionSchema.shape)
  .extend(CommonFlagsSchema.shape);

/**
 * month <year> <month>
 */
export const MonthCommandInputSchema = z
  .object({
    month: positiveInt('Month').max(12, 'Month must be 1-12'),
    year: positiveInt('Year').min(1000, 'Year must have four digits').max(9999, 'Year must have four digits'),
  })
  .extend(ProviderOptionSchema.shape)
  .extend(CommonFlagsSchema.shape);

/**
 * banks [date]; today when the date is omitted
 */
export const BanksCommandInputSchema = z.object({ date: DateArgumentSchema.optional() }).extend(CommonFlagsSchema.shape);

/**
 * history [--days n | --from d --to d]
 */
export const HistoryCommandInputSchema = z
  .object({
    days: positiveInt('--days').max(3650, '--days must be at most 3650').default(30),
    from: DateArgumentSchema.optional(),
    to: DateArgumentSchema.optional(),
  })
  .extend(ProviderOptionSchema.shape)
  .extend(CommonFlagsSchema.shape)
  .refine((data) => (data.from === undefined) === (data.to === undefined), {
    message: '--from and --to must be given together',
  });

export const RefreshCommandInputSchema = CommonFlagsSchema;

export const RefreshLogsCommandInputSchema = z
  .object({ limit: positiveInt('--limit').max(500, '--limit must be at most 500').default(20) })
  .extend(CommonFlagsSchema.shape);

/**
 * cache-range <start> <end>
 */
export const CacheRangeCommandInputSchema = z
  .object({ end: DateArgumentSchema, start: DateArgumentSchema })
  .extend(ProviderOptionSchema.shape)
  .extend(CommonFlagsSchema.shape);

/**
 * import-csv <file>
 */
export const ImportCsvCommandInputSchema = z
  .object({ file: z.string().trim().min(1, 'CSV file path is required') })
  .extend(CommonFlagsSchema.shape);

/**
 * Validate raw commander input. The error carries the first issue, prefixed
 * by its field when it has one.
 */
export function parseCommandInput<S extends z.ZodTypeAny>(schema: S, raw: unknown): Result<z.output<S>, Error> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const issue = parsed.error.issues[0];
  if (!issue) {
    return err(new Error('Invalid options'));
  }
  const field = issue.path.join('.');
  return err(new Error(field ? `${field}: ${issue.message}` : issue.message));
}
