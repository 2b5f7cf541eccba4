import { z } from 'zod'
import type { GenerationResult, ModelInfo, TokenUsage } from '../types/generation.js'
import type { Message } from '../types/messages.js'
import type { GenerationConfig } from './config.js'
import { PROVIDER_PRESETS } from './defaults.js'
import { parsePayload, requestJson } from './http.js'
import { BaseAdapter } from './model.js'
import type { RequestOptions } from './provider.js'

/**
 * Options for the local inference server adapter.
 */
export interface LocalInferenceAdapterOptions {
  /**
   * Model tag as the server knows it, e.g. `llama3.2:latest`.
   */
  modelId?: string

  /**
   * Server root. Defaults to `http://localhost:11434`.
   */
  baseUrl?: string

  timeoutMs?: number

  /**
   * Provider name reported on results and errors. Defaults to `ollama`.
   */
  provider?: string

  /**
   * Extra headers sent with every request, e.g. for an authenticating proxy.
   */
  headers?: Record<string, string>
}

const UsageFields = {
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
}

const GenerateResponseSchema = z.object({
  response: z.string(),
  ...UsageFields,
})

const ChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
  ...UsageFields,
})

const TagsResponseSchema = z.object({
  models: z.array(
    z.object({
      name: z.string(),
      size: z.number().optional(),
      modified_at: z.string().optional(),
    })
  ),
})

/**
 * Adapter for a local inference server speaking the Ollama HTTP API.
 *
 * Completion is native (`POST /api/generate`); chat uses `POST /api/chat`. Both are
 * sent with `stream: false`, so each call is a single round trip.
 *
 * @example
 * ```typescript
 * const adapter = new LocalInferenceAdapter({ modelId: 'llama3.2:latest' })
 * const result = await adapter.complete('Why is the sky blue?', new GenerationConfig({ maxTokens: 200 }))
 * console.log(result.text)
 * ```
 */
export class LocalInferenceAdapter extends BaseAdapter {
  readonly capabilities = { completion: 'native', streaming: false } as const

  private readonly _baseUrl: string
  private readonly _headers: Record<string, string> | undefined

  constructor(options: LocalInferenceAdapterOptions = {}) {
    super({
      provider: options.provider ?? PROVIDER_PRESETS.ollama.name,
      modelId: options.modelId ?? PROVIDER_PRESETS.ollama.defaultModel,
      timeoutMs: options.timeoutMs,
    })
    this._baseUrl = (options.baseUrl ?? PROVIDER_PRESETS.ollama.baseUrl).replace(/\/+$/, '')
    this._headers = options.headers
  }

  get baseUrl(): string {
    return this._baseUrl
  }

  async listModels(options: RequestOptions = {}): Promise<ModelInfo[]> {
    const payload = await requestJson({
      provider: this.provider,
      method: 'GET',
      url: `${this._baseUrl}/api/tags`,
      headers: this._headers,
      signal: options.signal,
    })
    const { models } = parsePayload(TagsResponseSchema, payload, this.provider)

    return models.map((model) => ({
      id: model.name,
      provider: this.provider,
      ...(model.size !== undefined ? { sizeBytes: model.size } : {}),
      ...(model.modified_at !== undefined ? { createdAt: model.modified_at } : {}),
    }))
  }

  protected override async _complete(
    prompt: string,
    config: GenerationConfig,
    options: RequestOptions
  ): Promise<GenerationResult> {
    const body = {
      model: this.modelId,
      prompt,
      stream: false,
      options: this._formatOptions(config),
      ...(config.systemPrompt !== undefined ? { system: config.systemPrompt } : {}),
    }

    const startedAt = performance.now()
    const payload = await this._post('/api/generate', body, options)
    const data = parsePayload(GenerateResponseSchema, payload, this.provider)
    return this._result(data.response, payload, this._usage(data), startedAt)
  }

  protected async _chat(messages: Message[], config: GenerationConfig, options: RequestOptions): Promise<GenerationResult> {
    const body = {
      model: this.modelId,
      messages: [
        ...(config.systemPrompt !== undefined ? [{ role: 'system', content: config.systemPrompt }] : []),
        ...messages.map((message) => ({ role: message.role, content: message.content })),
      ],
      stream: false,
      options: this._formatOptions(config),
    }

    const startedAt = performance.now()
    const payload = await this._post('/api/chat', body, options)
    const data = parsePayload(ChatResponseSchema, payload, this.provider)
    return this._result(data.message.content, payload, this._usage(data), startedAt)
  }

  private _post(path: string, body: unknown, options: RequestOptions): Promise<unknown> {
    return requestJson({
      provider: this.provider,
      method: 'POST',
      url: `${this._baseUrl}${path}`,
      body,
      headers: this._headers,
      signal: options.signal,
    })
  }

  /**
   * Maps generation parameters onto the server's `options` object.
   */
  private _formatOptions(config: GenerationConfig): Record<string, unknown> {
    return {
      temperature: config.temperature,
      top_p: config.topP,
      num_predict: config.maxTokens,
      ...(config.topK !== undefined ? { top_k: config.topK } : {}),
      ...(config.stopSequences.length > 0 ? { stop: [...config.stopSequences] } : {}),
      ...(config.frequencyPenalty !== 0 ? { frequency_penalty: config.frequencyPenalty } : {}),
      ...(config.presencePenalty !== 0 ? { presence_penalty: config.presencePenalty } : {}),
    }
  }

  private _usage(data: { prompt_eval_count?: number | undefined; eval_count?: number | undefined }): TokenUsage | undefined {
    if (data.prompt_eval_count === undefined && data.eval_count === undefined) {
      return undefined
    }
    return {
      promptTokens: data.prompt_eval_count ?? 0,
      completionTokens: data.eval_count ?? 0,
    }
  }
}
