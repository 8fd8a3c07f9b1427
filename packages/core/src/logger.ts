/**
 * @ipscout/core - Logging
 *
 * All packages log through pino. Library code stays quiet by default;
 * set IPSCOUT_LOG_LEVEL=debug to trace every resolver attempt.
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

const DEFAULT_LEVEL = 'warn';

/** True for pino's own level names and "silent". */
export function isLogLevel(value: string): boolean {
  return value === 'silent' || Object.hasOwn(pino.levels.values, value);
}

/**
 * Resolve the log level. Priority: IPSCOUT_LOG_LEVEL env var > "warn".
 * An unknown level falls back to "warn".
 */
export function resolveLogLevel(): string {
  const fromEnv = process.env['IPSCOUT_LOG_LEVEL']?.trim().toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return DEFAULT_LEVEL;
}

/**
 * Create a named pino logger.
 *
 * ```ts
 * const log = createLogger('@ipscout/dns');
 * log.debug({ server: '208.67.222.222' }, 'Querying DNS server');
 * ```
 */
export function createLogger(name: string, level: string = resolveLogLevel()): Logger {
  return pino({ name, level: isLogLevel(level) ? level : DEFAULT_LEVEL });
}
