import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

export type Logger = ConsolaInstance

// Root instance. Children copy its level when created, so every tagged
// logger is tracked here and kept in step by setLogLevel.
export const logger: Logger = createConsola({ level: LogLevels.info })

const tagged = new Map<string, Logger>()

// Scoped logger with [tag] prefix, one instance per tag
export function createLogger(tag: string): Logger {
  const existing = tagged.get(tag)
  if (existing)
    return existing
  const child = logger.withTag(tag)
  tagged.set(tag, child)
  return child
}

// Set global log level (root + every logger handed out by createLogger)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of tagged.values()) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
