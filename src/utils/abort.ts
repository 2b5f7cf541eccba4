import { CancelledError, InvalidConfigurationError, ModelClientError, TimeoutError } from '../errors.js'

/**
 * Longest delay a Node.js timer honours. Larger values fire after 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

/**
 * Checks that `timeoutMs` is a positive delay a timer can represent.
 *
 * @throws InvalidConfigurationError naming `field` otherwise
 */
export function validateTimeout(timeoutMs: number, field: string, provider?: string): number {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMER_DELAY_MS) {
    throw new InvalidConfigurationError(
      field,
      `Timeout must be a positive number of at most ${MAX_TIMER_DELAY_MS} ms, got ${timeoutMs}`,
      { provider }
    )
  }
  return timeoutMs
}

/**
 * Converts the reason of an aborted signal into a taxonomy error.
 *
 * Reasons that already are taxonomy errors (a `TimeoutError` set by the client's timer,
 * a `CancelledError` set on caller abort) pass through unchanged.
 */
export function abortReason(signal: AbortSignal, provider?: string): ModelClientError {
  const reason: unknown = signal.reason
  if (reason instanceof ModelClientError) {
    return reason
  }
  return new CancelledError(undefined, { provider, cause: reason })
}

/**
 * Throws the signal's abort reason if it has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, provider?: string): void {
  if (signal?.aborted) {
    throw abortReason(signal, provider)
  }
}

/**
 * Settles with `promise`, or rejects with the abort reason as soon as `signal` fires,
 * whichever comes first. Bounds work that does not observe its signal.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, provider?: string): Promise<T> {
  if (signal.aborted) {
    // Observe the abandoned promise so its rejection is not reported as unhandled.
    promise.catch(() => undefined)
    return Promise.reject(abortReason(signal, provider))
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal, provider))
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

/**
 * Resolves after `ms` milliseconds. Rejects early with the abort reason when `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal))
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal ? abortReason(signal) : new CancelledError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export interface DeadlineOptions {
  timeoutMs: number
  /**
   * Caller signal. Its abort becomes a {@link CancelledError}.
   */
  signal?: AbortSignal | undefined
  provider?: string | undefined
}

/**
 * Runs `run` under its own abort controller, bounded by `timeoutMs` and linked to the
 * caller's signal.
 *
 * Expiry aborts with a {@link TimeoutError}; a caller abort aborts with a
 * {@link CancelledError}. The returned promise settles no later than the abort, even if
 * `run` ignores the signal it was given.
 */
export async function withDeadline<T>(run: (signal: AbortSignal) => Promise<T>, options: DeadlineOptions): Promise<T> {
  const { timeoutMs, signal: callerSignal, provider } = options
  const controller = new AbortController()

  const timer = setTimeout(() => {
    controller.abort(
      new TimeoutError(`${provider ?? 'Request'} did not respond within ${timeoutMs} ms`, { provider, timeoutMs })
    )
  }, timeoutMs)

  const onCallerAbort = (): void => {
    const reason: unknown = callerSignal?.reason
    controller.abort(reason instanceof CancelledError ? reason : new CancelledError(undefined, { provider, cause: reason }))
  }
  if (callerSignal?.aborted) {
    onCallerAbort()
  } else {
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true })
  }

  try {
    return await raceAbort(run(controller.signal), controller.signal, provider)
  } finally {
    clearTimeout(timer)
    callerSignal?.removeEventListener('abort', onCallerAbort)
  }
}
