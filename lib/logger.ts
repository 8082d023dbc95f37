import pino from 'pino';

/** Minimal logging surface used by the connector and the pipeline. */
export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
}

// Centralized process logger.
// The log level can be controlled via the LOG_LEVEL env variable.
export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
});
