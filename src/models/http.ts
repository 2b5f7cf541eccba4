/**
 * JSON-over-HTTP plumbing for adapters that talk to a provider without an SDK.
 *
 * @internal This module is not part of the public API.
 */

import { z } from 'zod'
import { ConnectionError, ProviderError, errorFromStatus, normalizeError, parseRetryAfter } from '../errors.js'
import { abortReason } from '../utils/abort.js'
import { summarizeZodError } from '../utils/zod.js'

export interface JsonRequest {
  provider: string
  method: 'GET' | 'POST'
  url: string
  body?: unknown
  headers?: Record<string, string> | undefined
  signal?: AbortSignal | undefined
}

const MAX_DETAIL_LENGTH = 500

const ErrorBodySchema = z.union([
  z.object({ error: z.string() }),
  z.object({ error: z.object({ message: z.string() }) }),
])

function describeErrorBody(text: string): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text))
    if (parsed.success) {
      const { error } = parsed.data
      return typeof error === 'string' ? error : error.message
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }
  const trimmed = text.trim()
  return trimmed.length > MAX_DETAIL_LENGTH ? `${trimmed.slice(0, MAX_DETAIL_LENGTH)}...` : trimmed || 'no details'
}

/**
 * Performs one JSON request and returns the decoded body.
 *
 * @throws ConnectionError when the server cannot be reached
 * @throws The taxonomy error for a non-2xx status (see `errorFromStatus`)
 * @throws ProviderError when a 2xx body is not JSON
 * @throws The signal's abort reason when the request is aborted
 */
export async function requestJson(request: JsonRequest): Promise<unknown> {
  const { provider, method, url, body, headers, signal } = request

  let response: Response
  let text: string
  try {
    response = await fetch(url, {
      method,
      headers: {
        accept: 'application/json',
        ...(body !== undefined ? { 'content-type': 'application/json' } : {}),
        ...headers,
      },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      ...(signal ? { signal } : {}),
    })
    text = await response.text()
  } catch (error) {
    if (signal?.aborted) {
      throw abortReason(signal, provider)
    }
    throw new ConnectionError(`Could not reach ${provider} at ${url}: ${normalizeError(error).message}`, {
      provider,
      cause: error,
    })
  }

  if (!response.ok) {
    throw errorFromStatus(provider, response.status, describeErrorBody(text), parseRetryAfter(response.headers.get('retry-after')))
  }

  try {
    const payload: unknown = JSON.parse(text)
    return payload
  } catch (error) {
    throw new ProviderError(`${provider} returned a response that is not JSON`, {
      provider,
      status: response.status,
      cause: error,
    })
  }
}

/**
 * Validates a decoded response body against the shape the adapter expects.
 *
 * @throws ProviderError when the body does not match
 */
export function parsePayload<T extends z.ZodType>(schema: T, payload: unknown, provider: string): z.output<T> {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    const issue = summarizeZodError(parsed.error)
    throw new ProviderError(`${provider} returned an unexpected response shape at '${issue.path}': ${issue.message}`, {
      provider,
      cause: parsed.error,
    })
  }
  return parsed.data
}
