import { z } from 'zod';

export const logLevelsSchema = {
  audit: 5,
  debug: 20,
  error: 50,
  info: 30,
  trace: 10,
  warn: 40,
} as const;

export type LogLevelName = keyof typeof logLevelsSchema;

const booleanFromString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: booleanFromString('false'),
  LOGGER_FILE_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs'),
  LOGGER_FILE_LOG_ENABLED: booleanFromString('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('lkr-rates.log'),
  LOGGER_LOG_LEVEL: z
    .string()
    .refine((val: string) => Object.keys(logLevelsSchema).includes(val), {
      message: 'Invalid log level',
    })
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().default('lkr-rates'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
