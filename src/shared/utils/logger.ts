/**
 * Structured JSON logger.
 *
 * Uses Pino so suite output can be collected next to the cluster's own logs.
 */

import pino from 'pino';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not recognised.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 */
export function setupLogger(name: string = 'node-lease', level?: string): pino.Logger {
  const requested = (level ?? process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const logLevel: LogLevel = isLogLevel(requested) ? requested : 'info';

  return pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
