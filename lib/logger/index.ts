/**
 * Logger utility
 *
 * Thin wrapper over consola. The level comes from LOG_LEVEL (consola's
 * numeric levels: 0 fatal/error, 1 warn, 3 info, 4 debug); development
 * defaults to debug, everything else to info.
 */

import { createConsola, type ConsolaInstance } from 'consola'

function resolveLevel(): number {
  const configured = Number.parseInt(process.env.LOG_LEVEL ?? '', 10)
  if (Number.isInteger(configured)) return configured
  return process.env.NODE_ENV === 'development' ? 4 : 3
}

const rootLogger: ConsolaInstance = createConsola({
  level: resolveLevel()
})

const taggedLoggers = new Map<string, ConsolaInstance>()

/**
 * Get a logger tagged with the given module name
 */
export function useLogger(tag?: string): ConsolaInstance {
  if (!tag) return rootLogger

  let logger = taggedLoggers.get(tag)
  if (!logger) {
    logger = rootLogger.withTag(tag)
    taggedLoggers.set(tag, logger)
  }
  return logger
}

export default rootLogger
