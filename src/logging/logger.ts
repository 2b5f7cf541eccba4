/**
 * Logger configuration.
 *
 * Every adapter and client writes through the module-level `logger`. Callers swap it
 * for their own implementation to control levels, formatting and destinations.
 */

import type { Logger } from './types.js'

/**
 * Writes failures to the console and drops per-call and retry records.
 */
const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: (message, ...details) => console.warn(message, ...details),
  error: (message, ...details) => console.error(message, ...details),
}

/**
 * Current sink. Read at each call site, so a swap takes effect immediately.
 */
export let logger: Logger = defaultLogger

/**
 * Replaces the sink of every adapter and client.
 *
 * Per-call records (provider, model, attempts, duration, outcome) are emitted at info
 * level on success and warn level on failure, so an injected logger at info level sees
 * one record per call.
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import { configureLogging } from 'unified-model-client'
 *
 * configureLogging(pino({ level: 'info' }))
 * ```
 */
export function configureLogging(customLogger: Logger): void {
  logger = customLogger
}

/**
 * Restores the console-backed default logger.
 */
export function resetLogging(): void {
  logger = defaultLogger
}
