import pino from "pino";
import type { Logger } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";

// Base logger configuration
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    pid: process.pid,
    service: "guidstore",
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger = pino(baseConfig);

/**
 * Child logger for one component ("archive-store", "sharded-file-store", ...).
 */
export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

/**
 * Structured error logging; non-Error values are stringified.
 */
export const logError = (
  log: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>,
): void => {
  if (error instanceof Error) {
    log.warn({ err: error, ...context }, `${message}: ${error.message}`);
  } else {
    log.warn({ error: String(error), ...context }, message);
  }
};

export type { Logger };
