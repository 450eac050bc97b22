import { pino, destination, type Logger } from 'pino'
import type { LogLevel } from '../types/config.js'

export type { Logger }

/**
 * Create a pino logger for one component. Each thread builds its own
 * loggers; a logger is never handed across the bridge.
 *
 * Output goes to stderr so command output on stdout stays clean.
 */
export function createLogger(level: LogLevel, name: string): Logger {
  return pino({ name, level }, destination(2))
}

/** A logger that discards everything, for tests and embedding. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
