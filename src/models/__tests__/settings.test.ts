import { describe, it, expect, vi, afterEach } from 'vitest'
import { InvalidConfigurationError } from '../../errors.js'
import { PROVIDER_PRESETS, isBuiltinProvider } from '../defaults.js'
import { loadProviderSettings } from '../settings.js'

function settingsError(run: () => unknown): InvalidConfigurationError | undefined {
  try {
    run()
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      return error
    }
    throw error
  }
  return undefined
}

describe('loadProviderSettings', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('falls back to preset defaults', () => {
    expect(loadProviderSettings(PROVIDER_PRESETS.ollama, {})).toEqual({
      baseUrl: 'http://localhost:11434',
      apiKey: undefined,
      timeoutMs: 60000,
    })
  })

  it('reads the prefixed variables', () => {
    const settings = loadProviderSettings(PROVIDER_PRESETS.openai, {
      OPENAI_BASE_URL: 'https://proxy.example.test/v1/',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_TIMEOUT: '2.5',
    })

    expect(settings).toEqual({
      baseUrl: 'https://proxy.example.test/v1',
      apiKey: 'test-secret',
      timeoutMs: 2500,
    })
  })

  it('uses the preset prefix of OpenAI-compatible providers', () => {
    const settings = loadProviderSettings(PROVIDER_PRESETS.deepseek, {
      OPENAI_API_KEY: 'wrong-provider',
      DEEPSEEK_API_KEY: 'test-secret',
    })

    expect(settings.apiKey).toBe('test-secret')
    expect(settings.baseUrl).toBe('https://api.deepseek.com')
  })

  it('reads process.env by default', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret')
    vi.stubEnv('ANTHROPIC_TIMEOUT', '30')

    const settings = loadProviderSettings(PROVIDER_PRESETS.anthropic)

    expect(settings.apiKey).toBe('test-secret')
    expect(settings.timeoutMs).toBe(30000)
  })

  it('treats blank variables as unset', () => {
    const settings = loadProviderSettings(PROVIDER_PRESETS.vllm, { VLLM_API_KEY: '   ', VLLM_TIMEOUT: '' })

    expect(settings.apiKey).toBeUndefined()
    expect(settings.timeoutMs).toBe(60000)
  })

  it.each(['abc', '0', '-5', '2592000'])('rejects the timeout %j naming the variable', (value) => {
    const error = settingsError(() => loadProviderSettings(PROVIDER_PRESETS.openai, { OPENAI_TIMEOUT: value }))

    expect(error?.field).toBe('OPENAI_TIMEOUT')
    expect(error?.provider).toBe('openai')
  })

  it('rejects a malformed base URL naming the variable', () => {
    const error = settingsError(() =>
      loadProviderSettings(PROVIDER_PRESETS.deepseek, { DEEPSEEK_BASE_URL: 'not a url' })
    )

    expect(error?.field).toBe('DEEPSEEK_BASE_URL')
  })
})

describe('isBuiltinProvider', () => {
  it('recognizes preset names only', () => {
    expect(isBuiltinProvider('vllm')).toBe(true)
    expect(isBuiltinProvider('toString')).toBe(false)
    expect(isBuiltinProvider('mistral')).toBe(false)
  })
})
