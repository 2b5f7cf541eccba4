import Anthropic, { type ClientOptions } from '@anthropic-ai/sdk'
import { InvalidConfigurationError, InvalidRequestError } from '../errors.js'
import { logger } from '../logging/logger.js'
import type { GenerationResult, ModelInfo } from '../types/generation.js'
import type { Message } from '../types/messages.js'
import type { GenerationConfig } from './config.js'
import { PROVIDER_PRESETS } from './defaults.js'
import { BaseAdapter } from './model.js'
import type { RequestOptions } from './provider.js'
import { NO_SDK_RETRIES, translateSdkError } from './sdk-errors.js'

const MAX_TEMPERATURE = 1

export interface AnthropicAdapterOptions {
  modelId?: string
  provider?: string
  apiKey?: string | undefined
  baseUrl?: string | undefined
  timeoutMs?: number | undefined
  client?: Anthropic
  /**
   * Additional options forwarded to the SDK client constructor. `maxRetries` is always 0.
   */
  clientConfig?: ClientOptions
}

/**
 * Adapter for the Anthropic messages API.
 *
 * The messages API has no system role: the configured system prompt and any
 * system-role turns are joined, in order, into the `system` field.
 */
export class AnthropicAdapter extends BaseAdapter {
  readonly capabilities = { completion: 'chat', streaming: false } as const

  private readonly _client: Anthropic

  constructor(options: AnthropicAdapterOptions = {}) {
    const provider = options.provider ?? PROVIDER_PRESETS.anthropic.name
    super({
      provider,
      modelId: options.modelId ?? PROVIDER_PRESETS.anthropic.defaultModel,
      timeoutMs: options.timeoutMs,
    })

    const { apiKey, baseUrl, client, clientConfig } = options
    if (client) {
      this._client = client
    } else {
      if (!apiKey) {
        throw new InvalidConfigurationError(
          'apiKey',
          "Anthropic API key is required. Provide it via the 'apiKey' option or set the ANTHROPIC_API_KEY environment variable.",
          { provider }
        )
      }

      this._client = new Anthropic({
        apiKey,
        baseURL: baseUrl ?? PROVIDER_PRESETS.anthropic.baseUrl,
        timeout: this.timeoutMs,
        ...clientConfig,
        maxRetries: NO_SDK_RETRIES,
      })
    }
  }

  async listModels(options: RequestOptions = {}): Promise<ModelInfo[]> {
    try {
      const page = await this._client.models.list({}, { signal: options.signal, maxRetries: NO_SDK_RETRIES })
      return page.data.map((model) => ({
        id: model.id,
        provider: this.provider,
        displayName: model.display_name,
        createdAt: model.created_at,
      }))
    } catch (error) {
      throw translateSdkError(error, Anthropic, this.provider, options.signal)
    }
  }

  protected async _chat(messages: Message[], config: GenerationConfig, options: RequestOptions): Promise<GenerationResult> {
    const request = this._formatRequest(messages, config)
    const startedAt = performance.now()

    let response: Anthropic.Message
    try {
      response = await this._client.messages.create(request, {
        signal: options.signal,
        maxRetries: NO_SDK_RETRIES,
      })
    } catch (error) {
      throw translateSdkError(error, Anthropic, this.provider, options.signal)
    }

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')

    return this._result(
      text,
      response,
      { promptTokens: response.usage.input_tokens, completionTokens: response.usage.output_tokens },
      startedAt
    )
  }

  private _formatRequest(messages: Message[], config: GenerationConfig): Anthropic.MessageCreateParamsNonStreaming {
    const system: string[] = config.systemPrompt !== undefined ? [config.systemPrompt] : []
    const turns: Anthropic.MessageParam[] = []
    for (const message of messages) {
      if (message.role === 'system') {
        system.push(message.content)
      } else {
        turns.push({ role: message.role, content: message.content })
      }
    }

    if (turns.length === 0) {
      throw new InvalidRequestError('Chat requires at least one user or assistant message', {
        provider: this.provider,
      })
    }

    let temperature = config.temperature
    if (temperature > MAX_TEMPERATURE) {
      logger.warn(
        `provider=<${this.provider}>, temperature=<${temperature}> | temperature above ${MAX_TEMPERATURE} is not accepted, clamping`
      )
      temperature = MAX_TEMPERATURE
    }

    return {
      model: this.modelId,
      max_tokens: config.maxTokens,
      messages: turns,
      temperature,
      top_p: config.topP,
      ...(system.length > 0 ? { system: system.join('\n\n') } : {}),
      ...(config.topK !== undefined ? { top_k: config.topK } : {}),
      ...(config.stopSequences.length > 0 ? { stop_sequences: [...config.stopSequences] } : {}),
    }
  }
}
