import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LoggerEnvConfig, validateLoggerEnv } from './env.schema.js';

export type Logger = pino.Logger;

interface TransportMode {
  console: boolean;
  file: boolean;
}

// Cache for category loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance, created on first use so that env set up by the CLI entry point is honoured
let rootLogger: Logger | undefined;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(env: LoggerEnvConfig): boolean {
  // Vitest may set its flags after the env was first read
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createNoopStream(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

/**
 * Build pino transport targets for the enabled outputs.
 * Console output goes to stderr so stdout stays free for command output.
 */
export function buildTransportTargets(env: LoggerEnvConfig, mode: TransportMode): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [];

  if (mode.console) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      targets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    targets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_FILE_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  const env = validateLoggerEnv(process.env);
  const mode: TransportMode = {
    console: env.LOGGER_CONSOLE_ENABLED,
    file: env.LOGGER_FILE_LOG_ENABLED,
  };

  const options: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Skip all transports in test environment to avoid spawning worker threads
  const targets = isTestEnvironment(env) ? [] : buildTransportTargets(env, mode);

  // Without a target pino would default to stdout, which belongs to command output
  if (targets.length === 0) {
    return pino.pino(options, createNoopStream());
  }

  return pino.pino({ ...options, transport: { targets } });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger.
 *
 * The returned Proxy resolves the pino logger on first use, so loggers
 * captured at module top-level pick up the environment prepared by the CLI
 * entry point.
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
