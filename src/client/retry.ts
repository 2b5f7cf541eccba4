import { z } from 'zod'
import { InvalidConfigurationError, RateLimitedError, type ModelClientError } from '../errors.js'
import { MAX_TIMER_DELAY_MS } from '../utils/abort.js'
import { summarizeZodError } from '../utils/zod.js'

/**
 * Retry settings of a client.
 */
export interface RetryPolicyConfig {
  /**
   * Total attempts, including the first. 1 disables retries.
   */
  maxAttempts: number

  /**
   * Delay before the second attempt, in milliseconds.
   */
  initialDelayMs: number

  /**
   * Factor applied to the delay after each failed attempt.
   */
  backoffMultiplier: number

  /**
   * Upper bound of any single delay, including one requested by the provider.
   */
  maxDelayMs: number

  /**
   * Fraction in [0, 1] of random extra delay added on top of the computed one.
   */
  jitter: number
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicyConfig> = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 8000,
  jitter: 0,
})

const RetryPolicySchema = z.strictObject({
  maxAttempts: z.number().int().min(1),
  initialDelayMs: z.number().min(0).max(MAX_TIMER_DELAY_MS),
  backoffMultiplier: z.number().min(1),
  maxDelayMs: z.number().min(0).max(MAX_TIMER_DELAY_MS),
  jitter: z.number().min(0).max(1),
})

/**
 * Decides whether and when a failed attempt is retried.
 *
 * Only errors marked `retryable` are retried. Delays grow exponentially from
 * `initialDelayMs`, are capped at `maxDelayMs`, and never undercut a `Retry-After`
 * hint (itself capped).
 */
export class RetryPolicy {
  readonly maxAttempts: number
  readonly initialDelayMs: number
  readonly backoffMultiplier: number
  readonly maxDelayMs: number
  readonly jitter: number

  private readonly _random: () => number

  /**
   * @param config - Fields to override on {@link DEFAULT_RETRY_POLICY}
   * @param random - Source of jitter in [0, 1)
   */
  constructor(config: Partial<RetryPolicyConfig> = {}, random: () => number = Math.random) {
    const parsed = RetryPolicySchema.safeParse({ ...DEFAULT_RETRY_POLICY, ...config })
    if (!parsed.success) {
      const issue = summarizeZodError(parsed.error)
      const field = issue.field ?? 'retry'
      throw new InvalidConfigurationError(field, `Invalid retry policy field '${field}': ${issue.message}`, {
        cause: parsed.error,
      })
    }

    this.maxAttempts = parsed.data.maxAttempts
    this.initialDelayMs = parsed.data.initialDelayMs
    this.backoffMultiplier = parsed.data.backoffMultiplier
    this.maxDelayMs = parsed.data.maxDelayMs
    this.jitter = parsed.data.jitter
    this._random = random
  }

  /**
   * Whether another attempt follows failed attempt number `attempt` (1-based).
   */
  shouldRetry(error: ModelClientError, attempt: number): boolean {
    return error.retryable && attempt < this.maxAttempts
  }

  /**
   * Delay before the attempt that follows failed attempt number `attempt` (1-based).
   */
  delayFor(attempt: number, error?: ModelClientError): number {
    const exponential = this.initialDelayMs * this.backoffMultiplier ** Math.max(0, attempt - 1)
    let delay = Math.min(this.maxDelayMs, exponential)
    if (this.jitter > 0) {
      delay = Math.min(this.maxDelayMs, delay + delay * this.jitter * this._random())
    }
    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      delay = Math.max(delay, Math.min(this.maxDelayMs, error.retryAfterMs))
    }
    return Math.round(delay)
  }

  toJSON(): RetryPolicyConfig {
    return {
      maxAttempts: this.maxAttempts,
      initialDelayMs: this.initialDelayMs,
      backoffMultiplier: this.backoffMultiplier,
      maxDelayMs: this.maxDelayMs,
      jitter: this.jitter,
    }
  }
}
