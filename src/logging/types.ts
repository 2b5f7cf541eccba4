/**
 * Signature shared by every log level. The first argument is the formatted record
 * (`key=<value>, ... | text`); anything after it is passed through untouched.
 */
export type LogMethod = (message: string, ...details: unknown[]) => void

/**
 * Sink for the client's log records. `console`, Pino and Winston loggers all fit.
 */
export interface Logger {
  debug: LogMethod
  info: LogMethod
  warn: LogMethod
  error: LogMethod
}
