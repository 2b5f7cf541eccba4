import { describe, it, expect, vi, afterEach } from 'vitest'
import Anthropic from '@anthropic-ai/sdk'
import {
  AuthenticationError,
  ConnectionError,
  InvalidConfigurationError,
  InvalidRequestError,
  ProviderError,
  RateLimitedError,
} from '../../errors.js'
import { configureLogging, resetLogging } from '../../logging/logger.js'
import { GenerationConfig } from '../config.js'
import { AnthropicAdapter } from '../anthropic.js'

function message(blocks: Array<{ type: 'text'; text: string }>) {
  return {
    id: 'msg_test',
    type: 'message',
    role: 'assistant',
    model: 'claude-3-5-sonnet-20241022',
    content: blocks,
    stop_reason: 'end_turn',
    stop_sequence: null,
    usage: { input_tokens: 10, output_tokens: 2 },
  }
}

function createMockClient(create = vi.fn(), list = vi.fn()): Anthropic {
  return {
    messages: { create },
    models: { list },
  } as unknown as Anthropic
}

describe('AnthropicAdapter', () => {
  afterEach(() => {
    resetLogging()
  })

  describe('constructor', () => {
    it('requires an API key when no client is given', () => {
      expect(() => new AnthropicAdapter()).toThrow(InvalidConfigurationError)
    })

    it('builds a client from an API key', () => {
      const adapter = new AnthropicAdapter({ apiKey: 'test-secret', timeoutMs: 5000 })

      expect(adapter.provider).toBe('anthropic')
      expect(adapter.modelId).toBe('claude-3-5-sonnet-20241022')
      expect(adapter.timeoutMs).toBe(5000)
    })
  })

  describe('chat', () => {
    it('moves system content into the system field and joins text blocks', async () => {
      const create = vi.fn().mockResolvedValue(
        message([
          { type: 'text', text: 'Hello' },
          { type: 'text', text: ' world' },
        ])
      )
      const adapter = new AnthropicAdapter({ client: createMockClient(create) })

      const result = await adapter.chat(
        [
          { role: 'system', content: 'No emojis.' },
          { role: 'user', content: 'Greet me' },
        ],
        new GenerationConfig({ systemPrompt: 'Be brief.', topK: 5, stopSequences: ['STOP'] })
      )

      expect(create).toHaveBeenCalledWith(
        {
          model: 'claude-3-5-sonnet-20241022',
          max_tokens: 4096,
          messages: [{ role: 'user', content: 'Greet me' }],
          temperature: 0.7,
          top_p: 0.9,
          system: 'Be brief.\n\nNo emojis.',
          top_k: 5,
          stop_sequences: ['STOP'],
        },
        { signal: undefined, maxRetries: 0 }
      )
      expect(result.text).toBe('Hello world')
      expect(result.tokenUsage).toEqual({ promptTokens: 10, completionTokens: 2 })
      expect(result.provider).toBe('anthropic')
    })

    it('clamps temperatures above 1 and warns', async () => {
      const warn = vi.fn()
      configureLogging({ debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() })
      const create = vi.fn().mockResolvedValue(message([{ type: 'text', text: 'ok' }]))
      const adapter = new AnthropicAdapter({ client: createMockClient(create) })

      await adapter.chat([{ role: 'user', content: 'Hi' }], new GenerationConfig({ temperature: 1.6 }))

      expect(create.mock.calls[0]?.[0]).toMatchObject({ temperature: 1 })
      expect(warn).toHaveBeenCalledWith(
        'provider=<anthropic>, temperature=<1.6> | temperature above 1 is not accepted, clamping'
      )
    })

    it('rejects a conversation of only system messages without calling the API', async () => {
      const create = vi.fn()
      const adapter = new AnthropicAdapter({ client: createMockClient(create) })

      await expect(adapter.chat([{ role: 'system', content: 'Rules' }], new GenerationConfig())).rejects.toThrow(
        InvalidRequestError
      )
      expect(create).not.toHaveBeenCalled()
    })

    it('rejects an empty conversation without calling the API', async () => {
      const create = vi.fn()
      const adapter = new AnthropicAdapter({ client: createMockClient(create) })

      await expect(adapter.chat([], new GenerationConfig())).rejects.toThrow(InvalidRequestError)
      expect(create).not.toHaveBeenCalled()
    })

    it('completes a prompt as a single user turn', async () => {
      const create = vi.fn().mockResolvedValue(message([{ type: 'text', text: 'Blue' }]))
      const adapter = new AnthropicAdapter({ client: createMockClient(create) })

      const result = await adapter.complete('Sky colour?', new GenerationConfig())

      expect(create.mock.calls[0]?.[0]).toMatchObject({ messages: [{ role: 'user', content: 'Sky colour?' }] })
      expect(result.text).toBe('Blue')
    })
  })

  describe('error translation', () => {
    async function failureFor(thrown: unknown): Promise<unknown> {
      const create = vi.fn().mockRejectedValue(thrown)
      const adapter = new AnthropicAdapter({ client: createMockClient(create) })
      return adapter.chat([{ role: 'user', content: 'Hi' }], new GenerationConfig()).catch((error: unknown) => error)
    }

    it('maps 401 to an authentication failure', async () => {
      expect(await failureFor(new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined))).toBeInstanceOf(
        AuthenticationError
      )
    })

    it('maps 429 to a rate limit with the retry hint', async () => {
      const error = await failureFor(new Anthropic.APIError(429, undefined, 'rate limited', { 'retry-after': '4' }))

      expect(error).toBeInstanceOf(RateLimitedError)
      expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(4000)
    })

    it('maps an overloaded response to a retryable provider error', async () => {
      const error = await failureFor(new Anthropic.APIError(529, undefined, 'Overloaded', undefined))

      expect(error).toBeInstanceOf(ProviderError)
      expect(error instanceof ProviderError && error.retryable).toBe(true)
    })

    it('maps connection failures', async () => {
      expect(await failureFor(new Anthropic.APIConnectionError({ message: 'Connection error.' }))).toBeInstanceOf(
        ConnectionError
      )
    })
  })

  describe('listModels', () => {
    it('maps the model list', async () => {
      const list = vi.fn().mockResolvedValue({
        data: [
          {
            id: 'claude-3-5-sonnet-20241022',
            display_name: 'Claude 3.5 Sonnet (New)',
            created_at: '2024-10-22T00:00:00Z',
            type: 'model',
          },
        ],
      })
      const adapter = new AnthropicAdapter({ client: createMockClient(vi.fn(), list) })

      const models = await adapter.listModels()

      expect(list).toHaveBeenCalledWith({}, { signal: undefined, maxRetries: 0 })
      expect(models).toEqual([
        {
          id: 'claude-3-5-sonnet-20241022',
          provider: 'anthropic',
          displayName: 'Claude 3.5 Sonnet (New)',
          createdAt: '2024-10-22T00:00:00Z',
        },
      ])
    })
  })
})
