/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options.
 */

/**
 * Name attached to every log line
 */
export const LOGGER_NAME = "output-def";

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    name: LOGGER_NAME,
    level,
  };
}
