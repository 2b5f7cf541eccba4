/**
 * In-process adapter for client and registry tests.
 * Plays back a script of outcomes and records every call it receives.
 */

import type { GenerationConfig } from '../models/config.js'
import { BaseAdapter } from '../models/model.js'
import type { RequestOptions } from '../models/provider.js'
import type { GenerationResult, ModelInfo } from '../types/generation.js'
import type { Message } from '../types/messages.js'

export interface RecordedCall {
  messages: Message[]
  config: GenerationConfig
  signal: AbortSignal | undefined
}

/**
 * One scripted outcome: a reply text, an error to throw, or a function producing the reply.
 */
export type ScriptStep = string | Error | ((call: RecordedCall) => Promise<string>)

export interface ScriptedAdapterOptions {
  provider?: string
  modelId?: string
  timeoutMs?: number
  steps?: ScriptStep[]
  /**
   * Outcome once the script is exhausted. Defaults to the reply `ok`.
   */
  fallback?: ScriptStep
  models?: string[]
}

export class ScriptedAdapter extends BaseAdapter {
  readonly capabilities = { completion: 'chat', streaming: false } as const
  readonly calls: RecordedCall[] = []

  private readonly _steps: ScriptStep[]
  private readonly _fallback: ScriptStep
  private readonly _models: string[]

  constructor(options: ScriptedAdapterOptions = {}) {
    super({
      provider: options.provider ?? 'scripted',
      modelId: options.modelId ?? 'scripted-model',
      timeoutMs: options.timeoutMs,
    })
    this._steps = [...(options.steps ?? [])]
    this._fallback = options.fallback ?? 'ok'
    this._models = options.models ?? ['scripted-model']
  }

  async listModels(): Promise<ModelInfo[]> {
    return this._models.map((id) => ({ id, provider: this.provider }))
  }

  protected async _chat(messages: Message[], config: GenerationConfig, options: RequestOptions): Promise<GenerationResult> {
    const startedAt = performance.now()
    const call: RecordedCall = { messages, config, signal: options.signal }
    this.calls.push(call)

    const step = this._steps.shift() ?? this._fallback
    if (step instanceof Error) {
      throw step
    }
    const text = typeof step === 'string' ? step : await step(call)
    return this._result(text, { text }, { promptTokens: 3, completionTokens: 5 }, startedAt)
  }
}

/**
 * Step that only settles when the request's signal fires, rejecting with its reason.
 */
export function hangUntilAborted(call: RecordedCall): Promise<string> {
  return new Promise<string>((_resolve, reject) => {
    call.signal?.addEventListener('abort', () => reject(call.signal?.reason), { once: true })
  })
}

/**
 * Step that never settles and ignores its signal.
 */
export function hangForever(): Promise<string> {
  return new Promise<string>(() => {})
}

/**
 * Drains an async generator, returning everything it yielded and its return value.
 */
export async function collectGenerator<E, R>(generator: AsyncGenerator<E, R, undefined>): Promise<{ items: E[]; result: R }> {
  const items: E[] = []
  let next = await generator.next()
  while (!next.done) {
    items.push(next.value)
    next = await generator.next()
  }
  return { items, result: next.value }
}
