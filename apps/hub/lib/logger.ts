/**
 * Structured Logger
 *
 * Creates a pino-based logger shared across the work engine. Components take
 * a child logger tagged with their name, so every line says which part of
 * the engine wrote it.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level, base: { service: 'workbridge-hub' } })
}
