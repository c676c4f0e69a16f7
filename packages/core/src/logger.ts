import pino from 'pino';
import type { Level, Logger } from 'pino';

import type { LogLevel } from './definitions.js';

/**
 * Process-wide logger for the CLI, the builder and the runner. `LOG_LEVEL`
 * sets its level before any config is read; a run then narrows its own
 * children to the config's `log_level`.
 */
export const logger = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

/** Child logger whose lines carry `component` (cli, runner, builder, ...). */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

const PINO_LEVELS: Record<LogLevel, Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

/** Config level name to pino's; `debug: true` wins over any level. */
export function toPinoLevel(level: LogLevel, debug = false): Level {
  return debug ? 'debug' : PINO_LEVELS[level];
}

/** Levels a run takes from its schedule or single-workload context. */
export interface RunLogSettings {
  logLevel: LogLevel;
  debug: boolean;
}

/**
 * Component logger for one run, set to the run's level. The root logger keeps
 * its own level so runs with different configs do not leak into each other.
 */
export function createRunLogger(
  component: string,
  settings: RunLogSettings,
  bindings: Record<string, unknown> = {},
): Logger {
  const log = createLogger(component).child(bindings);
  log.level = toPinoLevel(settings.logLevel, settings.debug);
  return log;
}
