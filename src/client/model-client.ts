import { toModelClientError, type ModelClientError } from '../errors.js'
import { logger } from '../logging/logger.js'
import { GenerationConfig, type GenerationConfigInit } from '../models/config.js'
import type { ProviderAdapter } from '../models/provider.js'
import type { ConnectionStatus, GenerationResult, ModelInfo } from '../types/generation.js'
import { validateMessages, validatePrompt, type Message } from '../types/messages.js'
import { sleep, throwIfAborted, validateTimeout, withDeadline } from '../utils/abort.js'
import type { ClientEvent, ClientOperation } from './events.js'
import { RetryPolicy, type RetryPolicyConfig } from './retry.js'

/**
 * What a caller may pass as per-call configuration.
 */
export type GenerationInput = GenerationConfig | GenerationConfigInit

export interface ModelClientOptions {
  /**
   * Retry policy, or overrides of the default one.
   */
  retry?: RetryPolicy | Partial<RetryPolicyConfig> | undefined

  /**
   * Bound of each attempt in milliseconds. Defaults to the adapter's timeout.
   */
  timeoutMs?: number | undefined

  /**
   * Provider generation defaults, applied under explicit per-call fields.
   */
  defaults?: GenerationConfigInit | undefined
}

/**
 * Per-call options.
 */
export interface CallOptions {
  /**
   * Cancels the call: the in-flight attempt is aborted, no further attempt is made,
   * and the call fails with `CancelledError`.
   */
  signal?: AbortSignal | undefined

  /**
   * Overrides the client's per-attempt timeout for this call.
   */
  timeoutMs?: number | undefined
}

type Attempt = (signal: AbortSignal) => Promise<GenerationResult>

/**
 * Client bound to one provider adapter and one model.
 *
 * Owns the retry policy and the per-attempt timeout. Holds no per-call state, so one
 * instance serves any number of concurrent calls.
 *
 * Every call exists in two forms. `generateStream`/`chatStream` are async generators
 * that yield {@link ClientEvent}s for each attempt and return the result;
 * `generate`/`chat` consume them and return only the result.
 *
 * @example
 * ```typescript
 * const client = new ModelClient(new LocalInferenceAdapter(), { retry: { maxAttempts: 5 } })
 * const result = await client.generate('Write a haiku about rain', { temperature: 0.2 })
 * console.log(result.text)
 *
 * for await (const event of client.chatStream([{ role: 'user', content: 'Hello' }])) {
 *   if (event.type === 'retryScheduledEvent') {
 *     console.log(`retrying in ${event.delayMs} ms after ${event.error.kind}`)
 *   }
 * }
 * ```
 */
export class ModelClient {
  readonly adapter: ProviderAdapter
  readonly retryPolicy: RetryPolicy
  readonly timeoutMs: number

  private readonly _defaults: GenerationConfigInit

  constructor(adapter: ProviderAdapter, options: ModelClientOptions = {}) {
    this.adapter = adapter
    this.retryPolicy = options.retry instanceof RetryPolicy ? options.retry : new RetryPolicy(options.retry)
    this.timeoutMs = validateTimeout(options.timeoutMs ?? adapter.timeoutMs, 'timeoutMs', adapter.provider)
    // Resolving once validates the defaults at construction.
    GenerationConfig.resolve(undefined, options.defaults)
    this._defaults = { ...options.defaults }
  }

  get provider(): string {
    return this.adapter.provider
  }

  get modelId(): string {
    return this.adapter.modelId
  }

  /**
   * Cache key of the client: `provider:modelId`.
   */
  get key(): string {
    return `${this.provider}:${this.modelId}`
  }

  /**
   * Resolves the configuration a call would use: explicit field, else provider default, else library default.
   */
  resolveConfig(config?: GenerationInput): GenerationConfig {
    return GenerationConfig.resolve(config, this._defaults)
  }

  /**
   * Generates a continuation of `prompt`, retrying transient failures.
   *
   * @param prompt - Non-empty prompt text
   * @param config - Per-call generation parameters
   * @param options - Cancellation signal and timeout override
   */
  async generate(prompt: string, config?: GenerationInput, options?: CallOptions): Promise<GenerationResult> {
    const gen = this.generateStream(prompt, config, options)
    let result = await gen.next()
    while (!result.done) {
      result = await gen.next()
    }
    return result.value
  }

  /**
   * Generates the next assistant turn of `messages`, retrying transient failures.
   *
   * @param messages - Ordered, non-empty conversation
   * @param config - Per-call generation parameters
   * @param options - Cancellation signal and timeout override
   */
  async chat(messages: readonly Message[], config?: GenerationInput, options?: CallOptions): Promise<GenerationResult> {
    const gen = this.chatStream(messages, config, options)
    let result = await gen.next()
    while (!result.done) {
      result = await gen.next()
    }
    return result.value
  }

  /**
   * Streaming form of {@link ModelClient.generate}: yields attempt lifecycle events and returns the result.
   */
  async *generateStream(
    prompt: string,
    config?: GenerationInput,
    options: CallOptions = {}
  ): AsyncGenerator<ClientEvent, GenerationResult, undefined> {
    return yield* this._run(
      'generate',
      () => {
        validatePrompt(prompt, this.provider)
        const resolved = this.resolveConfig(config)
        return (signal) => this.adapter.complete(prompt, resolved, { signal })
      },
      options
    )
  }

  /**
   * Streaming form of {@link ModelClient.chat}: yields attempt lifecycle events and returns the result.
   */
  async *chatStream(
    messages: readonly Message[],
    config?: GenerationInput,
    options: CallOptions = {}
  ): AsyncGenerator<ClientEvent, GenerationResult, undefined> {
    return yield* this._run(
      'chat',
      () => {
        const validated = validateMessages(messages, this.provider)
        const resolved = this.resolveConfig(config)
        return (signal) => this.adapter.chat(validated, resolved, { signal })
      },
      options
    )
  }

  /**
   * Lists the provider's models, bounded by the client's timeout. Not retried.
   */
  async listModels(options: CallOptions = {}): Promise<ModelInfo[]> {
    const timeoutMs = validateTimeout(options.timeoutMs ?? this.timeoutMs, 'timeoutMs', this.provider)
    return withDeadline((signal) => this.adapter.listModels({ signal }), {
      timeoutMs,
      signal: options.signal,
      provider: this.provider,
    })
  }

  checkConnection(options: CallOptions = {}): Promise<ConnectionStatus> {
    return this.adapter.checkConnection({ signal: options.signal })
  }

  /**
   * Runs one call through the retry loop.
   *
   * `prepare` validates the request and returns the attempt; it runs before the first
   * attempt so that invalid requests fail without any network I/O.
   */
  private async *_run(
    operation: ClientOperation,
    prepare: () => Attempt,
    options: CallOptions
  ): AsyncGenerator<ClientEvent, GenerationResult, undefined> {
    const startedAt = performance.now()
    const { maxAttempts } = this.retryPolicy
    let attempts = 0

    try {
      const timeoutMs = validateTimeout(options.timeoutMs ?? this.timeoutMs, 'timeoutMs', this.provider)
      const attempt = prepare()

      for (let current = 1; ; current++) {
        throwIfAborted(options.signal, this.provider)
        attempts = current
        yield { type: 'attemptStartEvent', operation, attempt: current, maxAttempts }

        try {
          const result = await withDeadline(attempt, { timeoutMs, signal: options.signal, provider: this.provider })
          this._logOutcome(operation, startedAt, attempts)
          yield { type: 'attemptSuccessEvent', operation, attempt: current, latencyMs: result.latencyMs }
          return result
        } catch (error) {
          const failure = toModelClientError(error, this.provider)
          yield { type: 'attemptFailureEvent', operation, attempt: current, error: failure }

          if (!this.retryPolicy.shouldRetry(failure, current)) {
            throw failure
          }

          const delayMs = this.retryPolicy.delayFor(current, failure)
          logger.debug(
            `provider=<${this.provider}>, model=<${this.modelId}>, attempt=<${current}>, delay_ms=<${delayMs}>, error_kind=<${failure.kind}> | retrying`
          )
          yield { type: 'retryScheduledEvent', operation, attempt: current, delayMs, error: failure }
          await sleep(delayMs, options.signal)
        }
      }
    } catch (error) {
      const failure = toModelClientError(error, this.provider)
      this._logOutcome(operation, startedAt, attempts, failure)
      throw failure
    }
  }

  private _logOutcome(operation: ClientOperation, startedAt: number, attempts: number, failure?: ModelClientError): void {
    const durationMs = Math.round(performance.now() - startedAt)
    const fields = `provider=<${this.provider}>, model=<${this.modelId}>, operation=<${operation}>, attempts=<${attempts}>, duration_ms=<${durationMs}>`
    if (failure) {
      logger.warn(`${fields}, error_kind=<${failure.kind}> | model call failed: ${failure.message}`)
    } else {
      logger.info(`${fields} | model call succeeded`)
    }
  }
}
