import { describe, it, expect, afterEach } from 'vitest'
import { collectGenerator, ScriptedAdapter } from '../__fixtures__/scripted-adapter.js'
import { UnknownProviderError } from '../errors.js'
import { ClientRegistry, resetDefaultRegistry } from '../registry/client-registry.js'
import { quickChat, quickChatStream, quickGenerate, quickGenerateStream } from '../quick.js'

function registryWith(adapter: ScriptedAdapter): ClientRegistry {
  return new ClientRegistry({ builtins: false }).register('ollama', {
    defaultModel: adapter.modelId,
    factory: () => adapter,
  })
}

describe('quick calls', () => {
  afterEach(() => {
    resetDefaultRegistry()
  })

  it('generates with the default provider and returns only the text', async () => {
    const adapter = new ScriptedAdapter({ provider: 'ollama', modelId: 'llama3.2:latest', steps: ['Blue.'] })

    const text = await quickGenerate('Sky colour?', { registry: registryWith(adapter), config: { maxTokens: 8 } })

    expect(text).toBe('Blue.')
    expect(adapter.calls[0]?.config.maxTokens).toBe(8)
  })

  it('chats through the cached client of the chosen provider', async () => {
    const adapter = new ScriptedAdapter({ provider: 'ollama', steps: ['first', 'second'] })
    const registry = registryWith(adapter)

    await quickChat([{ role: 'user', content: 'one' }], { registry, provider: 'ollama' })
    await quickChat([{ role: 'user', content: 'two' }], { registry, provider: 'ollama' })

    expect(registry.stats().cachedClients).toBe(1)
    expect(registry.stats().hits).toBe(1)
    expect(adapter.calls.map((call) => call.messages[0]?.content)).toEqual(['one', 'two'])
  })

  it('streams attempt events and returns the text', async () => {
    const adapter = new ScriptedAdapter({ provider: 'ollama', steps: ['streamed'] })

    const { items, result } = await collectGenerator(quickGenerateStream('Hi', { registry: registryWith(adapter) }))

    expect(result).toBe('streamed')
    expect(items.map((event) => event.type)).toEqual(['attemptStartEvent', 'attemptSuccessEvent'])
  })

  it('streams a chat', async () => {
    const adapter = new ScriptedAdapter({ provider: 'ollama', steps: ['reply'] })

    const { result } = await collectGenerator(
      quickChatStream([{ role: 'user', content: 'Hi' }], { registry: registryWith(adapter) })
    )

    expect(result).toBe('reply')
  })

  it('rejects an unregistered provider', async () => {
    const registry = registryWith(new ScriptedAdapter())

    await expect(quickGenerate('Hi', { registry, provider: 'nowhere' })).rejects.toThrow(UnknownProviderError)
  })
})
