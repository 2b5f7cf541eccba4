import { z } from 'zod'
import { InvalidConfigurationError } from '../errors.js'
import { MAX_TIMER_DELAY_MS } from '../utils/abort.js'
import { DEFAULT_TIMEOUT_MS, type ProviderPreset } from './defaults.js'

/**
 * Connection settings of one provider.
 */
export interface ProviderSettings {
  baseUrl: string
  apiKey?: string | undefined
  /**
   * Per-request timeout in milliseconds.
   */
  timeoutMs: number
}

export type Environment = Record<string, string | undefined>

const BaseUrlSchema = z.url()
const TimeoutSecondsSchema = z.coerce.number().positive().max(MAX_TIMER_DELAY_MS / 1000)

function readVariable(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

/**
 * Reads a provider's settings from environment variables.
 *
 * | variable | meaning | default |
 * |---|---|---|
 * | `<PREFIX>_BASE_URL` | API root | preset base URL |
 * | `<PREFIX>_API_KEY` | credential | unset |
 * | `<PREFIX>_TIMEOUT` | request timeout in seconds | 60 |
 *
 * @param preset - The provider preset naming the prefix and defaults
 * @param env - Variable source, `process.env` by default
 * @throws InvalidConfigurationError naming the variable when a value is malformed
 */
export function loadProviderSettings(preset: ProviderPreset, env: Environment = process.env): ProviderSettings {
  const baseUrlVar = `${preset.envPrefix}_BASE_URL`
  const apiKeyVar = `${preset.envPrefix}_API_KEY`
  const timeoutVar = `${preset.envPrefix}_TIMEOUT`

  const rawBaseUrl = readVariable(env, baseUrlVar) ?? preset.baseUrl
  const baseUrl = BaseUrlSchema.safeParse(rawBaseUrl)
  if (!baseUrl.success) {
    throw new InvalidConfigurationError(baseUrlVar, `${baseUrlVar} is not a valid URL: ${rawBaseUrl}`, {
      provider: preset.name,
    })
  }

  let timeoutMs = DEFAULT_TIMEOUT_MS
  const rawTimeout = readVariable(env, timeoutVar)
  if (rawTimeout !== undefined) {
    const seconds = TimeoutSecondsSchema.safeParse(rawTimeout)
    if (!seconds.success) {
      throw new InvalidConfigurationError(
        timeoutVar,
        `${timeoutVar} must be a positive number of seconds, at most ${MAX_TIMER_DELAY_MS / 1000}`,
        { provider: preset.name }
      )
    }
    timeoutMs = Math.round(seconds.data * 1000)
  }

  return {
    baseUrl: baseUrl.data.replace(/\/+$/, ''),
    apiKey: readVariable(env, apiKeyVar),
    timeoutMs,
  }
}
