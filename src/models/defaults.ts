import type { GenerationConfigInit } from './config.js'

/**
 * Wire shape a provider speaks. Several providers may share one shape.
 */
export type ProviderShape = 'local' | 'openai' | 'anthropic'

export type BuiltinProvider = 'ollama' | 'openai' | 'anthropic' | 'deepseek' | 'vllm'

/**
 * Static description of a built-in provider.
 */
export interface ProviderPreset {
  name: BuiltinProvider
  shape: ProviderShape
  /**
   * Prefix of the `<PREFIX>_BASE_URL`, `<PREFIX>_API_KEY` and `<PREFIX>_TIMEOUT` variables.
   */
  envPrefix: string
  baseUrl: string
  defaultModel: string
  requiresApiKey: boolean
  generationDefaults: GenerationConfigInit
}

/**
 * Request timeout applied when neither the environment nor the caller sets one.
 */
export const DEFAULT_TIMEOUT_MS = 60_000

export const PROVIDER_PRESETS: Readonly<Record<BuiltinProvider, ProviderPreset>> = {
  ollama: {
    name: 'ollama',
    shape: 'local',
    envPrefix: 'OLLAMA',
    baseUrl: 'http://localhost:11434',
    defaultModel: 'llama3.2:latest',
    requiresApiKey: false,
    generationDefaults: {},
  },
  openai: {
    name: 'openai',
    shape: 'openai',
    envPrefix: 'OPENAI',
    baseUrl: 'https://api.openai.com/v1',
    defaultModel: 'gpt-4o',
    requiresApiKey: true,
    generationDefaults: {},
  },
  anthropic: {
    name: 'anthropic',
    shape: 'anthropic',
    envPrefix: 'ANTHROPIC',
    baseUrl: 'https://api.anthropic.com',
    defaultModel: 'claude-3-5-sonnet-20241022',
    requiresApiKey: true,
    // The messages API caps temperature at 1.
    generationDefaults: { temperature: 0.7 },
  },
  deepseek: {
    name: 'deepseek',
    shape: 'openai',
    envPrefix: 'DEEPSEEK',
    baseUrl: 'https://api.deepseek.com',
    defaultModel: 'deepseek-chat',
    requiresApiKey: true,
    generationDefaults: {},
  },
  vllm: {
    name: 'vllm',
    shape: 'openai',
    envPrefix: 'VLLM',
    baseUrl: 'http://localhost:8000/v1',
    defaultModel: 'default',
    requiresApiKey: false,
    generationDefaults: {},
  },
}

export function isBuiltinProvider(name: string): name is BuiltinProvider {
  return Object.prototype.hasOwnProperty.call(PROVIDER_PRESETS, name)
}
