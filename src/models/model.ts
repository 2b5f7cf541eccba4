import { InvalidConfigurationError, toModelClientError } from '../errors.js'
import { logger } from '../logging/logger.js'
import { createResult, type ConnectionStatus, type GenerationResult, type ModelInfo, type TokenUsage } from '../types/generation.js'
import { userMessage, validateMessages, validatePrompt, type Message } from '../types/messages.js'
import { throwIfAborted, validateTimeout, withDeadline } from '../utils/abort.js'
import type { GenerationConfig } from './config.js'
import { DEFAULT_TIMEOUT_MS } from './defaults.js'
import type { AdapterCapabilities, ProviderAdapter, RequestOptions } from './provider.js'

/**
 * Options shared by every adapter.
 */
export interface BaseAdapterOptions {
  /**
   * Provider name the adapter reports on results and errors.
   */
  provider: string

  /**
   * The model identifier, in the provider's own format.
   */
  modelId: string

  /**
   * Per-request timeout in milliseconds. Defaults to 60 seconds.
   */
  timeoutMs?: number | undefined
}

/**
 * Base abstract class for provider adapters.
 *
 * Validates requests before any network I/O and derives the optional operations from the
 * required ones: completion defaults to a single user-message chat, and the connection
 * probe is built on {@link ProviderAdapter.listModels}.
 */
export abstract class BaseAdapter implements ProviderAdapter {
  readonly provider: string
  readonly modelId: string
  readonly timeoutMs: number

  abstract readonly capabilities: AdapterCapabilities

  constructor(options: BaseAdapterOptions) {
    if (!options.modelId || options.modelId.trim() === '') {
      throw new InvalidConfigurationError('modelId', 'Model ID is required', { provider: options.provider })
    }
    const timeoutMs = validateTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, 'timeoutMs', options.provider)

    this.provider = options.provider
    this.modelId = options.modelId
    this.timeoutMs = timeoutMs
  }

  async complete(prompt: string, config: GenerationConfig, options: RequestOptions = {}): Promise<GenerationResult> {
    validatePrompt(prompt, this.provider)
    throwIfAborted(options.signal, this.provider)
    return this._complete(prompt, config, options)
  }

  async chat(
    messages: readonly Message[],
    config: GenerationConfig,
    options: RequestOptions = {}
  ): Promise<GenerationResult> {
    const validated = validateMessages(messages, this.provider)
    throwIfAborted(options.signal, this.provider)
    return this._chat(validated, config, options)
  }

  abstract listModels(options?: RequestOptions): Promise<ModelInfo[]>

  async checkConnection(options: RequestOptions = {}): Promise<ConnectionStatus> {
    const startedAt = performance.now()
    try {
      const models = await withDeadline((signal) => this.listModels({ signal }), {
        timeoutMs: this.timeoutMs,
        signal: options.signal,
        provider: this.provider,
      })
      return {
        provider: this.provider,
        connected: true,
        message: `Connected to ${this.provider}, ${models.length} model(s) available`,
        checkedAt: new Date(),
        modelsAvailable: models.length,
        latencyMs: Math.round(performance.now() - startedAt),
      }
    } catch (error) {
      const failure = toModelClientError(error, this.provider)
      logger.debug(`provider=<${this.provider}>, error_kind=<${failure.kind}> | connection check failed`)
      return {
        provider: this.provider,
        connected: false,
        message: failure.message,
        checkedAt: new Date(),
        modelsAvailable: 0,
        latencyMs: Math.round(performance.now() - startedAt),
        errorKind: failure.kind,
      }
    }
  }

  /**
   * Sends `messages` to the provider. `messages` is validated and non-empty.
   */
  protected abstract _chat(
    messages: Message[],
    config: GenerationConfig,
    options: RequestOptions
  ): Promise<GenerationResult>

  /**
   * Sends a completion. Providers without a completion endpoint inherit the chat mapping.
   */
  protected _complete(prompt: string, config: GenerationConfig, options: RequestOptions): Promise<GenerationResult> {
    return this._chat([userMessage(prompt)], config, options)
  }

  /**
   * Builds the result of a successful round trip that started at `startedAt`
   * (a `performance.now()` reading).
   */
  protected _result(
    text: string,
    rawProviderPayload: unknown,
    tokenUsage: TokenUsage | undefined,
    startedAt: number
  ): GenerationResult {
    return createResult({
      text,
      rawProviderPayload,
      tokenUsage,
      latencyMs: Math.round(performance.now() - startedAt),
      provider: this.provider,
      model: this.modelId,
    })
  }
}
