import type { Message } from '../types/messages.js'
import type { ConnectionStatus, GenerationResult, ModelInfo } from '../types/generation.js'
import type { GenerationConfig } from './config.js'

/**
 * Per-request options passed down from the client.
 */
export interface RequestOptions {
  /**
   * Aborts the in-flight request. Adapters reject with the signal's reason.
   */
  signal?: AbortSignal | undefined
}

/**
 * What an adapter can do natively.
 */
export interface AdapterCapabilities {
  /**
   * `native` when the provider has a raw completion endpoint, `chat` when completion
   * is sent as a single user-message chat.
   */
  completion: 'native' | 'chat'

  /**
   * Whether the adapter can stream tokens. No built-in adapter does.
   */
  streaming: boolean
}

/**
 * Contract every provider adapter implements.
 *
 * An adapter performs exactly one network round trip per operation, translates every
 * provider failure into the error taxonomy, and never retries. Retry and timeout policy
 * belong to the client.
 *
 * @example
 * ```typescript
 * class EchoAdapter extends BaseAdapter {
 *   readonly capabilities = { completion: 'chat', streaming: false } as const
 *
 *   constructor() {
 *     super({ provider: 'echo', modelId: 'echo' })
 *   }
 *
 *   async listModels(): Promise<ModelInfo[]> {
 *     return [{ id: this.modelId, provider: this.provider }]
 *   }
 *
 *   protected async _chat(messages: Message[]): Promise<GenerationResult> {
 *     const startedAt = performance.now()
 *     const text = messages.at(-1)?.content ?? ''
 *     return this._result(text, { text }, undefined, startedAt)
 *   }
 * }
 * ```
 */
export interface ProviderAdapter {
  /**
   * Provider name the adapter was registered under, e.g. `ollama`.
   */
  readonly provider: string

  readonly modelId: string

  /**
   * Default per-request timeout in milliseconds.
   */
  readonly timeoutMs: number

  readonly capabilities: AdapterCapabilities

  /**
   * Generates a continuation of `prompt`.
   *
   * @throws InvalidRequestError for an empty prompt, before any network I/O
   */
  complete(prompt: string, config: GenerationConfig, options?: RequestOptions): Promise<GenerationResult>

  /**
   * Generates the next assistant turn of `messages`.
   *
   * @throws InvalidRequestError for an empty list, before any network I/O
   */
  chat(messages: readonly Message[], config: GenerationConfig, options?: RequestOptions): Promise<GenerationResult>

  /**
   * Lists the models the provider reports.
   */
  listModels(options?: RequestOptions): Promise<ModelInfo[]>

  /**
   * Probes the provider. Never throws; failures are described in the returned status.
   */
  checkConnection(options?: RequestOptions): Promise<ConnectionStatus>
}
