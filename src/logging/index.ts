/**
 * Pluggable log sink.
 */

export { configureLogging, resetLogging, logger } from './logger.js'
export type { Logger, LogMethod } from './types.js'
