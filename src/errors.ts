/**
 * Error types for the model client.
 *
 * Every failure that leaves an adapter or a client is one of the classes below.
 * Callers branch on `kind` (or `instanceof`) and never see SDK or transport errors.
 */

/**
 * Discriminant shared by every error in the taxonomy.
 */
export type ErrorKind =
  | 'InvalidConfiguration'
  | 'InvalidRequest'
  | 'UnknownProvider'
  | 'AuthenticationFailure'
  | 'RateLimited'
  | 'Timeout'
  | 'ConnectionFailure'
  | 'ProviderError'
  | 'Cancelled'

export interface ModelClientErrorOptions {
  provider?: string | undefined
  cause?: unknown
}

/**
 * Base class of the taxonomy.
 *
 * `retryable` marks transient failures. The client's retry policy consults it and
 * nothing else.
 */
export abstract class ModelClientError extends Error {
  abstract readonly kind: ErrorKind
  abstract readonly retryable: boolean

  /**
   * Name of the provider that produced the failure, when known.
   */
  readonly provider: string | undefined

  constructor(message: string, options: ModelClientErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.provider = options.provider
  }
}

/**
 * A generation parameter or provider setting is malformed or out of range.
 */
export class InvalidConfigurationError extends ModelClientError {
  readonly kind = 'InvalidConfiguration'
  readonly retryable = false

  /**
   * The offending field, e.g. `temperature` or `OPENAI_TIMEOUT`.
   */
  readonly field: string

  constructor(field: string, message: string, options?: ModelClientErrorOptions) {
    super(message, options)
    this.name = 'InvalidConfigurationError'
    this.field = field
  }
}

/**
 * The request itself is unusable: empty prompt, empty or malformed message list.
 */
export class InvalidRequestError extends ModelClientError {
  readonly kind = 'InvalidRequest'
  readonly retryable = false

  constructor(message: string, options?: ModelClientErrorOptions) {
    super(message, options)
    this.name = 'InvalidRequestError'
  }
}

/**
 * No adapter factory is registered under the requested provider name.
 */
export class UnknownProviderError extends ModelClientError {
  readonly kind = 'UnknownProvider'
  readonly retryable = false
  readonly providerName: string

  constructor(providerName: string, known: readonly string[] = []) {
    const suffix = known.length > 0 ? ` Registered providers: ${known.join(', ')}.` : ''
    super(`Unknown provider '${providerName}'.${suffix}`)
    this.name = 'UnknownProviderError'
    this.providerName = providerName
  }
}

export class AuthenticationError extends ModelClientError {
  readonly kind = 'AuthenticationFailure'
  readonly retryable = false
  readonly status: number | undefined

  constructor(message: string, options: ModelClientErrorOptions & { status?: number | undefined } = {}) {
    super(message, options)
    this.name = 'AuthenticationError'
    this.status = options.status
  }
}

/**
 * The provider throttled the request. `retryAfterMs` carries the provider's hint, if it sent one.
 */
export class RateLimitedError extends ModelClientError {
  readonly kind = 'RateLimited'
  readonly retryable = true
  readonly retryAfterMs: number | undefined

  constructor(message: string, options: ModelClientErrorOptions & { retryAfterMs?: number | undefined } = {}) {
    super(message, options)
    this.name = 'RateLimitedError'
    this.retryAfterMs = options.retryAfterMs
  }
}

export class TimeoutError extends ModelClientError {
  readonly kind = 'Timeout'
  readonly retryable = true
  readonly timeoutMs: number | undefined

  constructor(message: string, options: ModelClientErrorOptions & { timeoutMs?: number | undefined } = {}) {
    super(message, options)
    this.name = 'TimeoutError'
    this.timeoutMs = options.timeoutMs
  }
}

/**
 * The provider could not be reached (refused, reset, DNS failure).
 */
export class ConnectionError extends ModelClientError {
  readonly kind = 'ConnectionFailure'
  readonly retryable = true

  constructor(message: string, options?: ModelClientErrorOptions) {
    super(message, options)
    this.name = 'ConnectionError'
  }
}

/**
 * The provider answered with an error or with a payload that could not be understood.
 *
 * Server-side failures (status 5xx) are transient; everything else is not.
 */
export class ProviderError extends ModelClientError {
  readonly kind = 'ProviderError'
  readonly retryable: boolean
  readonly status: number | undefined

  constructor(message: string, options: ModelClientErrorOptions & { status?: number | undefined } = {}) {
    super(message, options)
    this.name = 'ProviderError'
    this.status = options.status
    this.retryable = options.status !== undefined && options.status >= 500
  }
}

/**
 * The caller aborted the call through its `AbortSignal`.
 */
export class CancelledError extends ModelClientError {
  readonly kind = 'Cancelled'
  readonly retryable = false

  constructor(message = 'The call was cancelled', options?: ModelClientErrorOptions) {
    super(message, options)
    this.name = 'CancelledError'
  }
}

/**
 * Maps an HTTP status returned by a provider onto the taxonomy.
 *
 * @param provider - Provider name recorded on the error
 * @param status - HTTP status code of the failed response
 * @param detail - Provider-supplied message, if any
 * @param retryAfterMs - Parsed `Retry-After` hint
 */
export function errorFromStatus(
  provider: string,
  status: number,
  detail: string,
  retryAfterMs?: number,
  cause?: unknown
): ModelClientError {
  const message = `${provider} returned status ${status}: ${detail}`
  if (status === 401 || status === 403) {
    return new AuthenticationError(message, { provider, status, cause })
  }
  if (status === 408) {
    return new TimeoutError(message, { provider, cause })
  }
  if (status === 429) {
    return new RateLimitedError(message, { provider, retryAfterMs, cause })
  }
  return new ProviderError(message, { provider, status, cause })
}

/**
 * Parses a `Retry-After` header value (delay in seconds or an HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined || value.trim() === '') {
    return undefined
  }
  const seconds = Number(value)
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : undefined
  }
  const date = Date.parse(value)
  if (Number.isNaN(date)) {
    return undefined
  }
  return Math.max(0, date - now)
}

/**
 * Normalizes an unknown thrown value to an Error instance.
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Returns `error` unchanged when it already belongs to the taxonomy, otherwise wraps it
 * in a non-retryable {@link ProviderError} that keeps the original as `cause`.
 */
export function toModelClientError(error: unknown, provider?: string): ModelClientError {
  if (error instanceof ModelClientError) {
    return error
  }
  const normalized = normalizeError(error)
  return new ProviderError(`Unexpected failure${provider ? ` from ${provider}` : ''}: ${normalized.message}`, {
    provider,
    cause: normalized,
  })
}
