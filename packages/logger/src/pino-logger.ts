import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { logLevelsSchema, validateLoggerEnv } from './env.schema.js';

const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

export type Logger = pino.Logger<'audit'>;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

interface TransportMode {
  console: boolean;
  file: boolean;
}

// Mutable so the CLI can switch console output on for --verbose
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

function isTestEnv(): boolean {
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createRootLogger(): Logger {
  const transportTargets: TransportTarget[] = [];

  // Console output goes to stderr so stdout stays clean for --json
  if (transportMode.console) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
          messageFormat: '[{category}] {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      transportTargets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (transportMode.file) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: path.join(env.LOGGER_FILE_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  const pinoConfig: pino.LoggerOptions<'audit'> = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    customLevels: logLevelsSchema,
    level: env.LOGGER_LOG_LEVEL.toLowerCase(),
    timestamp: pino.stdTimeFunctions.isoTime,
    useOnlyCustomLevels: true,
  };

  // Tests and runs with every transport disabled write to a noop stream (no worker threads)
  if (isTestEnv() || transportTargets.length === 0) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino<'audit'>(pinoConfig, noopStream);
  }

  pinoConfig.transport = { targets: transportTargets };
  return pino.pino<'audit'>(pinoConfig);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child(
    {
      category,
      categoryLabel: formatLabel(category, 25),
    },
    { level: env.LOGGER_LOG_LEVEL.toLowerCase() }
  );

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * The Proxy looks up the current pino child on every property access, so
 * module-level loggers pick up `setLoggerTransports(...)` made later.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime. Cached loggers are dropped so the next
 * call builds them against the new transports.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}
