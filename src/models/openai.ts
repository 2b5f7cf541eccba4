/**
 * OpenAI-compatible chat completions adapter.
 *
 * Serves OpenAI itself and every provider that exposes the same REST shape under a
 * different base URL (DeepSeek, vLLM).
 */

import OpenAI, { type ClientOptions } from 'openai'
import { InvalidConfigurationError, ProviderError } from '../errors.js'
import type { GenerationResult, ModelInfo } from '../types/generation.js'
import type { Message } from '../types/messages.js'
import type { GenerationConfig } from './config.js'
import { PROVIDER_PRESETS } from './defaults.js'
import { BaseAdapter } from './model.js'
import type { RequestOptions } from './provider.js'
import { NO_SDK_RETRIES, translateSdkError } from './sdk-errors.js'

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam
type ChatCompletionRequest = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming

/**
 * Placeholder credential for self-hosted servers that accept any key.
 */
const UNAUTHENTICATED_API_KEY = 'EMPTY'

/**
 * Options for the OpenAI-compatible adapter.
 */
export interface OpenAIAdapterOptions {
  /**
   * Model to call. Defaults to `gpt-4o`.
   */
  modelId?: string

  /**
   * Provider name reported on results and errors. Defaults to `openai`.
   */
  provider?: string

  /**
   * Bearer credential. Required unless `requiresApiKey` is false or `client` is given.
   */
  apiKey?: string | undefined

  /**
   * API root, e.g. `https://api.deepseek.com`. Defaults to the OpenAI endpoint.
   */
  baseUrl?: string | undefined

  timeoutMs?: number | undefined

  /**
   * Whether construction fails without an API key. Self-hosted servers set this to false.
   */
  requiresApiKey?: boolean

  /**
   * Pre-configured client instance. When provided, `apiKey`, `baseUrl` and `clientConfig` are ignored.
   */
  client?: OpenAI

  /**
   * Additional options forwarded to the SDK client constructor. `maxRetries` is always 0.
   */
  clientConfig?: ClientOptions
}

/**
 * Adapter for the chat completions API.
 *
 * Completion is sent as a single user-message chat. The SDK's own retries are disabled;
 * the client owns the retry policy.
 *
 * @example
 * ```typescript
 * const adapter = new OpenAIAdapter({ modelId: 'gpt-4o', apiKey: process.env.OPENAI_API_KEY })
 *
 * const deepseek = new OpenAIAdapter({
 *   provider: 'deepseek',
 *   modelId: 'deepseek-chat',
 *   baseUrl: 'https://api.deepseek.com',
 *   apiKey: process.env.DEEPSEEK_API_KEY,
 * })
 * ```
 */
export class OpenAIAdapter extends BaseAdapter {
  readonly capabilities = { completion: 'chat', streaming: false } as const

  private readonly _client: OpenAI

  constructor(options: OpenAIAdapterOptions = {}) {
    const provider = options.provider ?? PROVIDER_PRESETS.openai.name
    super({
      provider,
      modelId: options.modelId ?? PROVIDER_PRESETS.openai.defaultModel,
      timeoutMs: options.timeoutMs,
    })

    const { apiKey, baseUrl, client, clientConfig, requiresApiKey = true } = options
    if (client) {
      this._client = client
    } else {
      if (!apiKey && requiresApiKey) {
        throw new InvalidConfigurationError(
          'apiKey',
          `${provider} API key is required. Provide it via the 'apiKey' option or the provider's API_KEY environment variable.`,
          { provider }
        )
      }

      this._client = new OpenAI({
        apiKey: apiKey || UNAUTHENTICATED_API_KEY,
        baseURL: baseUrl ?? PROVIDER_PRESETS.openai.baseUrl,
        timeout: this.timeoutMs,
        ...clientConfig,
        maxRetries: NO_SDK_RETRIES,
      })
    }
  }

  async listModels(options: RequestOptions = {}): Promise<ModelInfo[]> {
    try {
      const page = await this._client.models.list({ signal: options.signal, maxRetries: NO_SDK_RETRIES })
      return page.data.map((model) => ({
        id: model.id,
        provider: this.provider,
        createdAt: new Date(model.created * 1000).toISOString(),
      }))
    } catch (error) {
      throw translateSdkError(error, OpenAI, this.provider, options.signal)
    }
  }

  protected async _chat(messages: Message[], config: GenerationConfig, options: RequestOptions): Promise<GenerationResult> {
    const request = this._formatRequest(messages, config)
    const startedAt = performance.now()

    let completion: OpenAI.Chat.Completions.ChatCompletion
    try {
      completion = await this._client.chat.completions.create(request, {
        signal: options.signal,
        maxRetries: NO_SDK_RETRIES,
      })
    } catch (error) {
      throw translateSdkError(error, OpenAI, this.provider, options.signal)
    }

    const choice = completion.choices[0]
    if (!choice) {
      throw new ProviderError(`${this.provider} returned no choices`, { provider: this.provider })
    }

    const usage = completion.usage
      ? { promptTokens: completion.usage.prompt_tokens, completionTokens: completion.usage.completion_tokens }
      : undefined

    return this._result(choice.message.content ?? '', completion, usage, startedAt)
  }

  private _formatRequest(messages: Message[], config: GenerationConfig): ChatCompletionRequest {
    const formatted: ChatCompletionMessageParam[] = []
    if (config.systemPrompt !== undefined) {
      formatted.push({ role: 'system', content: config.systemPrompt })
    }
    formatted.push(...messages.map((message) => this._formatMessage(message)))

    return {
      model: this.modelId,
      messages: formatted,
      max_tokens: config.maxTokens,
      temperature: config.temperature,
      top_p: config.topP,
      ...(config.stopSequences.length > 0 ? { stop: [...config.stopSequences] } : {}),
      ...(config.frequencyPenalty !== 0 ? { frequency_penalty: config.frequencyPenalty } : {}),
      ...(config.presencePenalty !== 0 ? { presence_penalty: config.presencePenalty } : {}),
    }
  }

  private _formatMessage(message: Message): ChatCompletionMessageParam {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content }
      case 'assistant':
        return { role: 'assistant', content: message.content }
      case 'user':
        return { role: 'user', content: message.content }
    }
  }
}
