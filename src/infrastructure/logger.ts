import { type Logger, pino } from 'pino';
import { Validator } from '../domain/validation.js';

/** Environment variable holding the default log level. */
export const LOG_LEVEL_ENV = 'CASCADE_CONTAINER_LOG_LEVEL';

const validator = new Validator();

let shared: Logger | undefined;

/**
 * Creates a logger for the container. Silent unless `CASCADE_CONTAINER_LOG_LEVEL`
 * names a pino level.
 */
export function createLogger(level: string = process.env[LOG_LEVEL_ENV] ?? 'silent'): Logger {
  validator.validateLogLevel(LOG_LEVEL_ENV, level);
  return pino({ name: 'cascade-container', level });
}

/**
 * Logger shared by every container created without one.
 * Built on first use, so the level is read from the environment at that point.
 */
export function defaultLogger(): Logger {
  shared ??= createLogger();
  return shared;
}
