/**
 * Application logger backed by bunyan
 */
import bunyan from 'bunyan';

/**
 * Log levels, lowest first
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Match a level name case-insensitively
 */
export function findLogLevel(raw: string | undefined): LogLevel | undefined {
  const wanted = raw?.toLowerCase();
  return LOG_LEVELS.find(level => level === wanted);
}

const baseLogger = bunyan.createLogger({
  name: 'research-doc-parser',
  level: findLogLevel(process.env.LOG_LEVEL) ?? 'info',
  serializers: bunyan.stdSerializers,
  streams: [{ stream: process.stderr }],
});

/**
 * Set the log level
 */
export function setLogLevel(level: LogLevel): void {
  baseLogger.level(level);
}

/**
 * Bunyan fields for the optional data argument. Errors go under `err` so the
 * std serializer picks up the stack.
 */
function toFields(data: unknown): Record<string, unknown> {
  if (data instanceof Error) {
    return { err: data };
  }
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    return { data };
  }
  return { data: String(data) };
}

/**
 * Log a debug message
 */
export function debug(message: string, data?: unknown): void {
  if (data === undefined) {
    baseLogger.debug(message);
  } else {
    baseLogger.debug(toFields(data), message);
  }
}

/**
 * Log an info message
 */
export function info(message: string, data?: unknown): void {
  if (data === undefined) {
    baseLogger.info(message);
  } else {
    baseLogger.info(toFields(data), message);
  }
}

/**
 * Log a warning message
 */
export function warn(message: string, data?: unknown): void {
  if (data === undefined) {
    baseLogger.warn(message);
  } else {
    baseLogger.warn(toFields(data), message);
  }
}

/**
 * Log an error message
 */
export function error(message: string, data?: unknown): void {
  if (data === undefined) {
    baseLogger.error(message);
  } else {
    baseLogger.error(toFields(data), message);
  }
}

/**
 * Export logger object
 */
export const logger = {
  debug,
  info,
  warn,
  error,
  setLogLevel,
};

export default logger;
