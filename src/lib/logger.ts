/**
 * Structured logging
 *
 * JSON lines via pino. Core functions receive the logger through the
 * resolver context and derive a child per component.
 */

import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level: LevelWithSilent;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions): Logger {
  const base = { service: 'player-stats-resolver' };

  if (options.destination) {
    return pino({ level: options.level, base }, options.destination);
  }
  return pino({ level: options.level, base });
}

/**
 * Child logger tagged with the component that emits it
 */
export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}
