/**
 * One-shot helpers that resolve a cached client and return only the generated text.
 */

import type { ClientEvent } from './client/events.js'
import type { CallOptions, GenerationInput, ModelClient } from './client/model-client.js'
import { getDefaultRegistry, type ClientRegistry } from './registry/client-registry.js'
import type { Message } from './types/messages.js'

export const DEFAULT_QUICK_PROVIDER = 'ollama'

export interface QuickOptions extends CallOptions {
  /**
   * Provider name. Defaults to `ollama`.
   */
  provider?: string

  /**
   * Model identifier. Defaults to the provider's default model.
   */
  model?: string

  config?: GenerationInput

  /**
   * Registry to resolve the client from. Defaults to the process-wide registry.
   */
  registry?: ClientRegistry
}

function resolveClient(options: QuickOptions): ModelClient {
  const registry = options.registry ?? getDefaultRegistry()
  return registry.getClient(options.provider ?? DEFAULT_QUICK_PROVIDER, options.model)
}

function callOptions(options: QuickOptions): CallOptions {
  return { signal: options.signal, timeoutMs: options.timeoutMs }
}

/**
 * Generates a completion of `prompt` and returns its text.
 *
 * @example
 * ```typescript
 * const text = await quickGenerate('Name three primes', { provider: 'openai', model: 'gpt-4o' })
 * ```
 */
export async function quickGenerate(prompt: string, options: QuickOptions = {}): Promise<string> {
  const result = await resolveClient(options).generate(prompt, options.config, callOptions(options))
  return result.text
}

/**
 * Generates the next assistant turn of `messages` and returns its text.
 */
export async function quickChat(messages: readonly Message[], options: QuickOptions = {}): Promise<string> {
  const result = await resolveClient(options).chat(messages, options.config, callOptions(options))
  return result.text
}

/**
 * Streaming form of {@link quickGenerate}: yields attempt events, returns the text.
 */
export async function* quickGenerateStream(
  prompt: string,
  options: QuickOptions = {}
): AsyncGenerator<ClientEvent, string, undefined> {
  const client = resolveClient(options)
  const result = yield* client.generateStream(prompt, options.config, callOptions(options))
  return result.text
}

/**
 * Streaming form of {@link quickChat}: yields attempt events, returns the text.
 */
export async function* quickChatStream(
  messages: readonly Message[],
  options: QuickOptions = {}
): AsyncGenerator<ClientEvent, string, undefined> {
  const client = resolveClient(options)
  const result = yield* client.chatStream(messages, options.config, callOptions(options))
  return result.text
}
