export { getLogger, setLoggerTransports, type Logger } from './pino-logger.js';
export { logLevelsSchema, validateLoggerEnv, type LoggerEnvConfig, type LogLevelName } from './env.schema.js';
