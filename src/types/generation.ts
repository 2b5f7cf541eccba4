import type { ErrorKind } from '../errors.js'

/**
 * Token accounting reported by a provider.
 */
export interface TokenUsage {
  promptTokens: number
  completionTokens: number
}

/**
 * Outcome of one successful generation.
 *
 * Produced once per call and owned by the caller. Instances are frozen.
 */
export interface GenerationResult {
  /**
   * The generated text.
   */
  readonly text: string

  /**
   * The provider's response body, untouched.
   */
  readonly rawProviderPayload: unknown

  /**
   * Token usage, when the provider reports it.
   */
  readonly tokenUsage?: Readonly<TokenUsage> | undefined

  /**
   * Wall-clock time of the network round trip in milliseconds.
   */
  readonly latencyMs: number

  readonly provider: string
  readonly model: string
}

/**
 * Builds a frozen {@link GenerationResult}, omitting `tokenUsage` when the provider sent none.
 */
export function createResult(fields: {
  text: string
  rawProviderPayload: unknown
  tokenUsage?: TokenUsage | undefined
  latencyMs: number
  provider: string
  model: string
}): GenerationResult {
  const { tokenUsage, ...rest } = fields
  return Object.freeze({
    ...rest,
    ...(tokenUsage ? { tokenUsage: Object.freeze({ ...tokenUsage }) } : {}),
  })
}

/**
 * A model a provider reports as available.
 */
export interface ModelInfo {
  id: string
  provider: string
  displayName?: string
  /**
   * ISO-8601 timestamp, when the provider reports one.
   */
  createdAt?: string
  sizeBytes?: number
}

/**
 * Result of a connectivity probe. Probes never throw; failures are described here.
 */
export interface ConnectionStatus {
  provider: string
  connected: boolean
  message: string
  checkedAt: Date
  modelsAvailable: number
  latencyMs?: number
  errorKind?: ErrorKind
}
