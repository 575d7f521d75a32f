/**
 * Logger utility using Winston
 *
 * Structured, component-tagged logging. Everything goes to stderr so that
 * process output and log output never mix when the toolbox runs under a
 * supervisor that captures stdout.
 */

import winston from 'winston';
import chalk from 'chalk';

export type LogMeta = Record<string, unknown>;

let logger: winston.Logger | undefined;

function colorLevel(level: string): string {
  const tag = `[${level.toUpperCase()}]`;
  switch (level) {
    case 'error':
      return chalk.red(tag);
    case 'warn':
      return chalk.yellow(tag);
    case 'info':
      return chalk.green(tag);
    case 'debug':
      return chalk.blue(tag);
    default:
      return tag;
  }
}

/**
 * Initialize the logger
 */
export function initializeLogger(debug: boolean = false): void {
  logger = createLogger(debug);
}

function createLogger(debug: boolean): winston.Logger {
  return winston.createLogger({
    level: debug ? 'debug' : 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
        const timestampStr = debug ? `[${String(timestamp)}] ` : '';
        const componentStr = typeof component === 'string' ? ` ${chalk.cyan(`[${component}]`)}` : '';
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

        return `${timestampStr}${colorLevel(level)}${componentStr} ${String(message)}${metaStr}`.trim();
      })
    ),
    transports: [
      new winston.transports.Stream({ stream: process.stderr }),
    ],
  });
}

/**
 * Get the logger instance
 */
export function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger(false);
  }
  return logger;
}

export function logInfo(message: string, meta?: LogMeta): void {
  getLogger().info(message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  getLogger().debug(message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  getLogger().warn(message, meta);
}

/**
 * Log an error message. Error instances are flattened to message + stack.
 */
export function logError(message: string, error?: Error | LogMeta): void {
  if (error instanceof Error) {
    getLogger().error(message, { error: error.message, stack: error.stack });
  } else {
    getLogger().error(message, error);
  }
}

/**
 * Normalise an unknown thrown value into something logError accepts.
 */
export function toLoggable(error: unknown): Error | LogMeta {
  return error instanceof Error ? error : { error: String(error) };
}
