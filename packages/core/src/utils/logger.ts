/**
 * Logger using Pino
 *
 * - JSON structured logging (production) / Pretty printing (development)
 * - Environment-based log levels (debug in dev, info in prod)
 * - In-process logger without worker transports under test
 * - Child loggers scoped by service
 *
 * Usage:
 * ```typescript
 * const prefLogger = createChildLogger({ service: 'Preference' });
 * prefLogger.debug({ identifier }, 'Released preference payload');
 * ```
 */

import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';
import { env, isDev, isTest } from '../config/environment';

const logLevel = env.LOG_LEVEL ?? (isDev ? 'debug' : 'info');

const allowedServices = env.LOG_SERVICES;

function createTransport() {
  const targets: TransportTargetOptions[] = [];

  if (isDev) {
    targets.push({
      level: logLevel,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env',
        singleLine: false,
        messageFormat: '[{service}] {msg}',
      },
    });
  } else {
    // Production: JSON to stdout
    targets.push({
      level: logLevel,
      target: 'pino/file',
      options: {
        destination: 1, // stdout file descriptor
      },
    });
  }

  return pino.transport({ targets });
}

const options: pino.LoggerOptions = {
  level: logLevel,

  serializers: {
    err: pino.stdSerializers.err,
  },

  base: {
    env: env.NODE_ENV,
    service: 'instrument-prefs',
  },

  timestamp: pino.stdTimeFunctions.isoTime,
};

// Worker-thread transports would outlive a test run
export const logger: Logger = isTest ? pino(options) : pino(options, createTransport());

/**
 * Create a child logger with additional context
 *
 * When LOG_SERVICES is set, only the listed services log; every other
 * child logger is silent.
 *
 * @example
 * const builderLogger = createChildLogger({ service: 'PreferenceBuilder' });
 * builderLogger.error({ identifier }, 'Builder used after build()');
 */
export const createChildLogger = (context: { service: string } & Record<string, unknown>): Logger => {
  if (allowedServices.length > 0 && !allowedServices.includes(context.service)) {
    return pino({ level: 'silent' });
  }

  return logger.child(context);
};
