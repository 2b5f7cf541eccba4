import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  collectGenerator,
  hangForever,
  hangUntilAborted,
  ScriptedAdapter,
} from '../../__fixtures__/scripted-adapter.js'
import {
  AuthenticationError,
  CancelledError,
  ConnectionError,
  InvalidConfigurationError,
  InvalidRequestError,
  ProviderError,
  RateLimitedError,
  TimeoutError,
} from '../../errors.js'
import { configureLogging, resetLogging } from '../../logging/logger.js'
import { GenerationConfig } from '../../models/config.js'
import type { ClientEvent } from '../events.js'
import { ModelClient } from '../model-client.js'

const fastRetry = { initialDelayMs: 1, backoffMultiplier: 2, maxDelayMs: 50 }

function eventTypes(events: ClientEvent[]): string[] {
  return events.map((event) => event.type)
}

describe('ModelClient', () => {
  const log = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }

  beforeEach(() => {
    log.debug.mockReset()
    log.info.mockReset()
    log.warn.mockReset()
    log.error.mockReset()
    configureLogging(log)
  })

  afterEach(() => {
    resetLogging()
  })

  describe('construction', () => {
    it('is identified by provider and model', () => {
      const client = new ModelClient(new ScriptedAdapter({ provider: 'ollama', modelId: 'llama3.2:latest' }))

      expect(client.provider).toBe('ollama')
      expect(client.modelId).toBe('llama3.2:latest')
      expect(client.key).toBe('ollama:llama3.2:latest')
    })

    it("defaults the timeout to the adapter's", () => {
      expect(new ModelClient(new ScriptedAdapter({ timeoutMs: 1234 })).timeoutMs).toBe(1234)
      expect(new ModelClient(new ScriptedAdapter(), { timeoutMs: 99 }).timeoutMs).toBe(99)
    })

    it('validates its options', () => {
      expect(() => new ModelClient(new ScriptedAdapter(), { timeoutMs: -1 })).toThrow(InvalidConfigurationError)
      expect(() => new ModelClient(new ScriptedAdapter(), { timeoutMs: 30 * 24 * 3600 * 1000 })).toThrow(
        InvalidConfigurationError
      )
      expect(() => new ModelClient(new ScriptedAdapter(), { retry: { maxAttempts: 0 } })).toThrow(
        InvalidConfigurationError
      )
      expect(() => new ModelClient(new ScriptedAdapter(), { defaults: { temperature: 9 } })).toThrow(
        InvalidConfigurationError
      )
    })
  })

  describe('generate', () => {
    it('returns the adapter result on the first attempt', async () => {
      const adapter = new ScriptedAdapter({ steps: ['Hello!'] })
      const client = new ModelClient(adapter)

      const result = await client.generate('Say hello')

      expect(result.text).toBe('Hello!')
      expect(result.tokenUsage).toEqual({ promptTokens: 3, completionTokens: 5 })
      expect(adapter.calls).toHaveLength(1)
      expect(adapter.calls[0]?.messages).toEqual([{ role: 'user', content: 'Say hello' }])
    })

    it('resolves per-call config over client defaults', async () => {
      const adapter = new ScriptedAdapter()
      const client = new ModelClient(adapter, { defaults: { maxTokens: 256, temperature: 0.4 } })

      await client.generate('a', { temperature: 0.2 })
      await client.generate('b', new GenerationConfig({ maxTokens: 10 }))
      await client.generate('c')

      expect(adapter.calls.map((call) => [call.config.temperature, call.config.maxTokens])).toEqual([
        [0.2, 256],
        [0.4, 10],
        [0.4, 256],
      ])
    })

    it('rejects an empty prompt without reaching the adapter', async () => {
      const adapter = new ScriptedAdapter()
      const client = new ModelClient(adapter)

      await expect(client.generate('')).rejects.toThrow(InvalidRequestError)
      expect(adapter.calls).toHaveLength(0)
    })

    it('rejects an invalid config without reaching the adapter', async () => {
      const adapter = new ScriptedAdapter()
      const client = new ModelClient(adapter)

      await expect(client.generate('Hi', { topP: 0 })).rejects.toThrow(InvalidConfigurationError)
      expect(adapter.calls).toHaveLength(0)
    })
  })

  describe('chat', () => {
    it('forwards the conversation in order', async () => {
      const adapter = new ScriptedAdapter({ steps: ['Fine, thanks.'] })
      const client = new ModelClient(adapter)
      const messages = [
        { role: 'system' as const, content: 'Be polite.' },
        { role: 'user' as const, content: 'How are you?' },
      ]

      const result = await client.chat(messages)

      expect(result.text).toBe('Fine, thanks.')
      expect(adapter.calls[0]?.messages).toEqual(messages)
    })

    it('rejects an empty conversation without reaching the adapter', async () => {
      const adapter = new ScriptedAdapter()
      const client = new ModelClient(adapter)

      await expect(client.chat([])).rejects.toThrow(InvalidRequestError)
      expect(adapter.calls).toHaveLength(0)
    })
  })

  describe('retries', () => {
    it('succeeds after N-1 transient failures with growing delays', async () => {
      const adapter = new ScriptedAdapter({
        steps: [new ConnectionError('refused'), new TimeoutError('slow'), 'recovered'],
      })
      const client = new ModelClient(adapter, { retry: { ...fastRetry, maxAttempts: 3 } })

      const { items, result } = await collectGenerator(client.generateStream('Hi'))

      expect(result.text).toBe('recovered')
      expect(adapter.calls).toHaveLength(3)
      expect(eventTypes(items)).toEqual([
        'attemptStartEvent',
        'attemptFailureEvent',
        'retryScheduledEvent',
        'attemptStartEvent',
        'attemptFailureEvent',
        'retryScheduledEvent',
        'attemptStartEvent',
        'attemptSuccessEvent',
      ])
      const delays = items.flatMap((event) => (event.type === 'retryScheduledEvent' ? [event.delayMs] : []))
      expect(delays).toEqual([1, 2])
    })

    it('makes exactly maxAttempts calls and surfaces the last error', async () => {
      const failure = new ProviderError('upstream unavailable', { status: 503 })
      const adapter = new ScriptedAdapter({ fallback: failure })
      const client = new ModelClient(adapter, { retry: { ...fastRetry, maxAttempts: 4 } })

      await expect(client.generate('Hi')).rejects.toBe(failure)
      expect(adapter.calls).toHaveLength(4)
    })

    it('does not retry an authentication failure', async () => {
      const adapter = new ScriptedAdapter({ fallback: new AuthenticationError('bad key', { status: 401 }) })
      const client = new ModelClient(adapter, { retry: { ...fastRetry, maxAttempts: 5 } })

      await expect(client.chat([{ role: 'user', content: 'Hi' }])).rejects.toThrow(AuthenticationError)
      expect(adapter.calls).toHaveLength(1)
    })

    it('waits at least as long as a rate limit hint', async () => {
      const adapter = new ScriptedAdapter({ steps: [new RateLimitedError('slow down', { retryAfterMs: 20 })] })
      const client = new ModelClient(adapter, { retry: fastRetry })

      const { items } = await collectGenerator(client.generateStream('Hi'))

      const retry = items.find((event) => event.type === 'retryScheduledEvent')
      expect(retry?.type === 'retryScheduledEvent' && retry.delayMs).toBe(20)
    })

    it('wraps unexpected adapter errors as non-retryable provider errors', async () => {
      const bug = new TypeError('cannot read properties of undefined')
      const adapter = new ScriptedAdapter({ fallback: bug })
      const client = new ModelClient(adapter, { retry: fastRetry })

      const error = await client.generate('Hi').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ProviderError)
      expect(error instanceof ProviderError && error.cause).toBe(bug)
      expect(adapter.calls).toHaveLength(1)
    })
  })

  describe('timeouts', () => {
    it('aborts each slow attempt and retries it as a timeout', async () => {
      const adapter = new ScriptedAdapter({ fallback: hangUntilAborted })
      const client = new ModelClient(adapter, { timeoutMs: 20, retry: { ...fastRetry, maxAttempts: 2 } })

      const error = await client.generate('Hi').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TimeoutError)
      expect(error instanceof TimeoutError && error.timeoutMs).toBe(20)
      expect(adapter.calls).toHaveLength(2)
      expect(adapter.calls.every((call) => call.signal?.aborted)).toBe(true)
    })

    it('bounds an adapter that ignores its signal', async () => {
      const adapter = new ScriptedAdapter({ fallback: hangForever })
      const client = new ModelClient(adapter, { retry: { maxAttempts: 1 } })

      await expect(client.generate('Hi', undefined, { timeoutMs: 15 })).rejects.toThrow(TimeoutError)
    })
  })

  it('rejects a per-call timeout a timer cannot represent without reaching the adapter', async () => {
    const adapter = new ScriptedAdapter()
    const client = new ModelClient(adapter)

    await expect(client.generate('Hi', undefined, { timeoutMs: 2 ** 31 })).rejects.toThrow(InvalidConfigurationError)
    expect(adapter.calls).toHaveLength(0)
  })

  describe('cancellation', () => {
    it('fails with CancelledError and does not retry when aborted mid-attempt', async () => {
      const adapter = new ScriptedAdapter({ fallback: hangUntilAborted })
      const client = new ModelClient(adapter, { retry: fastRetry })
      const controller = new AbortController()

      const pending = client.generate('Hi', undefined, { signal: controller.signal })
      setTimeout(() => controller.abort(), 5)

      await expect(pending).rejects.toThrow(CancelledError)
      expect(adapter.calls).toHaveLength(1)
    })

    it('stops during the backoff delay', async () => {
      const adapter = new ScriptedAdapter({ fallback: new ConnectionError('refused') })
      const client = new ModelClient(adapter, { retry: { initialDelayMs: 60_000, maxDelayMs: 60_000 } })
      const controller = new AbortController()
      const stream = client.generateStream('Hi', undefined, { signal: controller.signal })

      let next = await stream.next()
      while (!next.done && next.value.type !== 'retryScheduledEvent') {
        next = await stream.next()
      }
      controller.abort()

      await expect(stream.next()).rejects.toThrow(CancelledError)
      expect(adapter.calls).toHaveLength(1)
    })

    it('does not start when the signal already fired', async () => {
      const adapter = new ScriptedAdapter()
      const client = new ModelClient(adapter)
      const controller = new AbortController()
      controller.abort()

      await expect(client.generate('Hi', undefined, { signal: controller.signal })).rejects.toThrow(CancelledError)
      expect(adapter.calls).toHaveLength(0)
    })
  })

  describe('concurrency', () => {
    it('keeps concurrent calls with distinct configs independent', async () => {
      const adapter = new ScriptedAdapter({
        fallback: async (call) => {
          await new Promise((resolve) => setTimeout(resolve, Math.round((1 - call.config.temperature) * 10)))
          return `temperature=${call.config.temperature}`
        },
      })
      const client = new ModelClient(adapter)

      const results = await Promise.all(
        [0.1, 0.5, 0.9].map((temperature) => client.generate(`t${temperature}`, { temperature }))
      )

      expect(results.map((result) => result.text)).toEqual(['temperature=0.1', 'temperature=0.5', 'temperature=0.9'])
    })
  })

  describe('logging', () => {
    it('emits one info record per successful call', async () => {
      const client = new ModelClient(new ScriptedAdapter({ steps: [new ConnectionError('refused'), 'ok'] }), {
        retry: fastRetry,
      })

      await client.generate('Hi')

      expect(log.info).toHaveBeenCalledTimes(1)
      expect(log.warn).not.toHaveBeenCalled()
      expect(log.info.mock.calls[0]?.[0]).toMatch(
        /^provider=<scripted>, model=<scripted-model>, operation=<generate>, attempts=<2>, duration_ms=<\d+> \| model call succeeded$/
      )
    })

    it('emits one warn record per failed call', async () => {
      const client = new ModelClient(new ScriptedAdapter({ fallback: new AuthenticationError('bad key') }))

      await expect(client.chat([{ role: 'user', content: 'Hi' }])).rejects.toThrow(AuthenticationError)

      expect(log.warn).toHaveBeenCalledTimes(1)
      expect(log.info).not.toHaveBeenCalled()
      expect(log.warn.mock.calls[0]?.[0]).toMatch(
        /^provider=<scripted>, model=<scripted-model>, operation=<chat>, attempts=<1>, duration_ms=<\d+>, error_kind=<AuthenticationFailure> \| model call failed: bad key$/
      )
    })
  })

  describe('listModels and checkConnection', () => {
    it('pass through to the adapter', async () => {
      const client = new ModelClient(new ScriptedAdapter({ models: ['a', 'b', 'c'] }))

      expect((await client.listModels()).map((model) => model.id)).toEqual(['a', 'b', 'c'])
      const status = await client.checkConnection()
      expect(status.connected).toBe(true)
      expect(status.modelsAvailable).toBe(3)
    })
  })
})
