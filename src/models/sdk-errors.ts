/**
 * Error translation for adapters built on a vendor SDK.
 *
 * @internal This module is not part of the public API.
 */

import { z } from 'zod'
import {
  CancelledError,
  ConnectionError,
  ModelClientError,
  TimeoutError,
  errorFromStatus,
  parseRetryAfter,
  toModelClientError,
} from '../errors.js'
import { abortReason } from '../utils/abort.js'

interface SdkApiError extends Error {
  readonly status: number | undefined
  readonly headers?: unknown
}

type ErrorClass<T extends Error> = new (...args: never[]) => T

/**
 * The error classes both vendor SDKs expose as statics on their client class.
 */
export interface SdkErrorClasses {
  APIError: ErrorClass<SdkApiError>
  APIConnectionError: ErrorClass<Error>
  APIConnectionTimeoutError: ErrorClass<Error>
  APIUserAbortError: ErrorClass<Error>
}

/**
 * Retry count handed to the vendor SDKs, on the client and on every request. Attempts
 * are owned by the model client's retry policy.
 */
export const NO_SDK_RETRIES = 0

const HeaderRecordSchema = z.record(z.string(), z.unknown())

function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined
  }
  const record = HeaderRecordSchema.safeParse(headers)
  if (!record.success) {
    return undefined
  }
  const value = record.data[name]
  return typeof value === 'string' ? value : undefined
}

/**
 * Translates an error thrown by an SDK call into the taxonomy.
 *
 * @param error - What the SDK threw
 * @param sdk - The SDK's error classes
 * @param provider - Provider name recorded on the result
 * @param signal - The request's signal; when it fired, its reason wins
 */
export function translateSdkError(
  error: unknown,
  sdk: SdkErrorClasses,
  provider: string,
  signal?: AbortSignal
): ModelClientError {
  if (signal?.aborted) {
    return abortReason(signal, provider)
  }
  if (error instanceof ModelClientError) {
    return error
  }
  if (error instanceof sdk.APIUserAbortError) {
    return new CancelledError(undefined, { provider, cause: error })
  }
  // Timeout extends the connection error class, so it is matched first.
  if (error instanceof sdk.APIConnectionTimeoutError) {
    return new TimeoutError(`${provider} request timed out`, { provider, cause: error })
  }
  if (error instanceof sdk.APIConnectionError) {
    return new ConnectionError(`Could not reach ${provider}: ${error.message}`, { provider, cause: error })
  }
  if (error instanceof sdk.APIError && error.status !== undefined) {
    const retryAfterMs = parseRetryAfter(readHeader(error.headers, 'retry-after'))
    return errorFromStatus(provider, error.status, error.message, retryAfterMs, error)
  }
  return toModelClientError(error, provider)
}
