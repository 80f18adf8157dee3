import pino from 'pino';
import { z } from 'zod';

/** Levels accepted by {@link createLogger}. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Structured logger surface used across the client; pino-backed by default, injectable for tests. */
export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

/** Options for {@link createLogger}. */
export interface LoggerConfig {
  /** Overrides the level taken from the environment */
  level?: LogLevel;
}

const levelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Level from the environment: any `QIZX_DEBUG` value turns on debug output,
 * otherwise `LOG_LEVEL`, otherwise `info`. Unknown levels fall back to `info`.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.QIZX_DEBUG !== undefined) {
    return 'debug';
  }

  const parsed = levelSchema.safeParse(env.LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

// stdout carries query results for the CLI, so logs go to stderr
const baseLogger = pino(
  {
    level: levelFromEnv(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

/**
 * Create a logger instance for a specific component.
 */
export function createLogger(component: string, config?: LoggerConfig): Logger {
  const logger = baseLogger.child({ component });

  if (config?.level) {
    logger.level = config.level;
  }

  return {
    debug: (message, data) => (data ? logger.debug(data, message) : logger.debug(message)),
    info: (message, data) => (data ? logger.info(data, message) : logger.info(message)),
    warn: (message, data) => (data ? logger.warn(data, message) : logger.warn(message)),
    error: (message, data) => (data ? logger.error(data, message) : logger.error(message)),
  };
}
