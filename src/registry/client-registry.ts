import { ModelClient, type ModelClientOptions } from '../client/model-client.js'
import { InvalidConfigurationError, UnknownProviderError } from '../errors.js'
import { logger } from '../logging/logger.js'
import type { GenerationConfigInit } from '../models/config.js'
import type { ProviderAdapter } from '../models/provider.js'
import type { Environment, ProviderSettings } from '../models/settings.js'
import { BUILTIN_PROVIDERS, builtinRegistration } from './builtins.js'

/**
 * What an adapter factory receives when the registry builds a client.
 */
export interface AdapterFactoryContext {
  provider: string
  modelId: string
  /**
   * The registration's connection settings, when it declares any.
   */
  settings: ProviderSettings | undefined
}

export type AdapterFactory = (context: AdapterFactoryContext) => ProviderAdapter

/**
 * How the registry builds clients for one provider name.
 */
export interface ProviderRegistration {
  factory: AdapterFactory

  /**
   * Model used when `getClient` is called without one.
   */
  defaultModel: string

  /**
   * Connection settings, or a function that reads them when a client is built.
   */
  settings?: ProviderSettings | (() => ProviderSettings)

  /**
   * Provider generation defaults, applied under explicit per-call fields.
   */
  generationDefaults?: GenerationConfigInit

  /**
   * Retry and timeout options of the clients built for this provider.
   */
  clientOptions?: ModelClientOptions
}

export interface ClientRegistryOptions {
  /**
   * Register the built-in providers (`ollama`, `openai`, `anthropic`, `deepseek`, `vllm`). Defaults to true.
   */
  builtins?: boolean

  /**
   * Variable source for the built-in providers' settings. Defaults to `process.env`.
   */
  env?: Environment

  /**
   * Client options applied to every provider that does not set its own.
   */
  clientOptions?: ModelClientOptions
}

export interface RegistryStats {
  providers: string[]
  cachedClients: number
  clientsByProvider: Record<string, number>
  hits: number
  misses: number
}

/**
 * Maps provider names to adapter factories and caches one {@link ModelClient} per
 * `provider:modelId` pair.
 *
 * `getClient` is synchronous, so resolving or creating a client cannot interleave with
 * another caller's; at most one client is ever built per key.
 *
 * @example
 * ```typescript
 * const registry = new ClientRegistry()
 * const client = registry.getClient('openai', 'gpt-4o')
 * registry.getClient('openai', 'gpt-4o') === client // true
 * ```
 */
export class ClientRegistry {
  private readonly _providers = new Map<string, ProviderRegistration>()
  private readonly _clients = new Map<string, ModelClient>()
  private readonly _clientOptions: ModelClientOptions | undefined
  private _hits = 0
  private _misses = 0

  constructor(options: ClientRegistryOptions = {}) {
    this._clientOptions = options.clientOptions
    if (options.builtins ?? true) {
      for (const name of BUILTIN_PROVIDERS) {
        this._providers.set(name, builtinRegistration(name, options.env))
      }
    }
  }

  /**
   * Registers `name`, replacing any existing registration. Cached clients of a replaced
   * provider are evicted.
   */
  register(name: string, registration: ProviderRegistration): this {
    const key = normalizeProvider(name)
    if (key === '' || key.includes(':')) {
      throw new InvalidConfigurationError('provider', `Invalid provider name '${name}'`)
    }
    if (this._providers.has(key)) {
      this.evict(key)
    }
    this._providers.set(key, registration)
    return this
  }

  /**
   * Removes `name` and evicts its cached clients.
   *
   * @returns Whether the provider was registered
   */
  unregister(name: string): boolean {
    const key = normalizeProvider(name)
    this.evict(key)
    return this._providers.delete(key)
  }

  has(name: string): boolean {
    return this._providers.has(normalizeProvider(name))
  }

  providers(): string[] {
    return [...this._providers.keys()]
  }

  /**
   * Resolves or creates the client for `provider` and `modelId`.
   *
   * @param provider - Registered provider name, case-insensitive
   * @param modelId - Model identifier; defaults to the provider's default model
   * @throws UnknownProviderError when `provider` is not registered
   * @throws InvalidConfigurationError when the provider's settings are unusable
   */
  getClient(provider: string, modelId?: string): ModelClient {
    const name = normalizeProvider(provider)
    const registration = this._providers.get(name)
    if (!registration) {
      throw new UnknownProviderError(provider, this.providers())
    }

    const model = modelId ?? registration.defaultModel
    const key = `${name}:${model}`
    const cached = this._clients.get(key)
    if (cached) {
      this._hits++
      return cached
    }

    this._misses++
    const settings = typeof registration.settings === 'function' ? registration.settings() : registration.settings
    const adapter = registration.factory({ provider: name, modelId: model, settings })
    const client = new ModelClient(adapter, {
      ...this._clientOptions,
      ...registration.clientOptions,
      defaults: {
        ...this._clientOptions?.defaults,
        ...registration.generationDefaults,
        ...registration.clientOptions?.defaults,
      },
    })
    this._clients.set(key, client)
    logger.debug(`provider=<${name}>, model=<${model}> | created client`)
    return client
  }

  /**
   * Keys (`provider:modelId`) of the cached clients, in creation order.
   */
  cachedKeys(): string[] {
    return [...this._clients.keys()]
  }

  /**
   * Drops cached clients of `provider`, or only the one for `modelId` when given.
   *
   * @returns Number of clients dropped
   */
  evict(provider: string, modelId?: string): number {
    const name = normalizeProvider(provider)
    if (modelId !== undefined) {
      return this._clients.delete(`${name}:${modelId}`) ? 1 : 0
    }

    let dropped = 0
    for (const key of [...this._clients.keys()]) {
      if (key.startsWith(`${name}:`)) {
        this._clients.delete(key)
        dropped++
      }
    }
    return dropped
  }

  /**
   * Drops every cached client. Registrations stay.
   */
  clear(): void {
    this._clients.clear()
    this._hits = 0
    this._misses = 0
  }

  stats(): RegistryStats {
    const clientsByProvider: Record<string, number> = {}
    for (const key of this._clients.keys()) {
      const provider = key.slice(0, key.indexOf(':'))
      clientsByProvider[provider] = (clientsByProvider[provider] ?? 0) + 1
    }
    return {
      providers: this.providers(),
      cachedClients: this._clients.size,
      clientsByProvider,
      hits: this._hits,
      misses: this._misses,
    }
  }
}

function normalizeProvider(name: string): string {
  return name.trim().toLowerCase()
}

let defaultRegistry: ClientRegistry | undefined

/**
 * Process-wide registry with the built-in providers, created on first use.
 */
export function getDefaultRegistry(): ClientRegistry {
  defaultRegistry ??= new ClientRegistry()
  return defaultRegistry
}

/**
 * Drops the process-wide registry; the next {@link getDefaultRegistry} call builds a fresh one.
 */
export function resetDefaultRegistry(): void {
  defaultRegistry = undefined
}
