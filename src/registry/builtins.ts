import { AnthropicAdapter } from '../models/anthropic.js'
import { PROVIDER_PRESETS, type BuiltinProvider, type ProviderPreset } from '../models/defaults.js'
import { LocalInferenceAdapter } from '../models/local.js'
import { OpenAIAdapter } from '../models/openai.js'
import type { ProviderAdapter } from '../models/provider.js'
import { loadProviderSettings, type Environment, type ProviderSettings } from '../models/settings.js'
import type { AdapterFactoryContext, ProviderRegistration } from './client-registry.js'

function createAdapter(
  preset: ProviderPreset,
  context: AdapterFactoryContext,
  settings: ProviderSettings
): ProviderAdapter {
  const { provider, modelId } = context
  switch (preset.shape) {
    case 'local':
      return new LocalInferenceAdapter({
        provider,
        modelId,
        baseUrl: settings.baseUrl,
        timeoutMs: settings.timeoutMs,
        ...(settings.apiKey ? { headers: { authorization: `Bearer ${settings.apiKey}` } } : {}),
      })
    case 'openai':
      return new OpenAIAdapter({
        provider,
        modelId,
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl,
        timeoutMs: settings.timeoutMs,
        requiresApiKey: preset.requiresApiKey,
      })
    case 'anthropic':
      return new AnthropicAdapter({
        provider,
        modelId,
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl,
        timeoutMs: settings.timeoutMs,
      })
  }
}

/**
 * Registration of a built-in provider whose settings come from `env`.
 */
export function builtinRegistration(name: BuiltinProvider, env?: Environment): ProviderRegistration {
  const preset = PROVIDER_PRESETS[name]
  return {
    defaultModel: preset.defaultModel,
    generationDefaults: preset.generationDefaults,
    settings: (): ProviderSettings => loadProviderSettings(preset, env),
    factory: (context) => createAdapter(preset, context, context.settings ?? loadProviderSettings(preset, env)),
  }
}

export const BUILTIN_PROVIDERS: readonly BuiltinProvider[] = ['ollama', 'openai', 'anthropic', 'deepseek', 'vllm']
