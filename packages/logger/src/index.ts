export { buildTransportTargets, getLogger, type Logger } from './pino-logger.js';
export { loggerEnvSchema, logLevels, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
