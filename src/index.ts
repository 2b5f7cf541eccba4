/**
 * Main entry point of the unified model client.
 *
 * One interface over a local inference server and hosted model APIs: per-call
 * generation configuration, a shared error taxonomy, central retry and timeout policy,
 * and a registry that caches one client per provider and model.
 */

// Error types
export {
  ModelClientError,
  InvalidConfigurationError,
  InvalidRequestError,
  UnknownProviderError,
  AuthenticationError,
  RateLimitedError,
  TimeoutError,
  ConnectionError,
  ProviderError,
  CancelledError,
  errorFromStatus,
  normalizeError,
  toModelClientError,
} from './errors.js'
export type { ErrorKind, ModelClientErrorOptions } from './errors.js'

// Logging
export { configureLogging, resetLogging } from './logging/index.js'
export type { Logger } from './logging/index.js'

// Message and result types
export { validateMessages, validatePrompt, userMessage } from './types/messages.js'
export type { Message, Role } from './types/messages.js'
export type { GenerationResult, TokenUsage, ModelInfo, ConnectionStatus } from './types/generation.js'

// Generation configuration
export { GenerationConfig, DEFAULT_GENERATION } from './models/config.js'
export type { GenerationConfigInit, GenerationField, GenerationSettings } from './models/config.js'

// Provider presets and settings
export { PROVIDER_PRESETS, DEFAULT_TIMEOUT_MS, isBuiltinProvider } from './models/defaults.js'
export type { BuiltinProvider, ProviderPreset, ProviderShape } from './models/defaults.js'
export { loadProviderSettings } from './models/settings.js'
export type { ProviderSettings, Environment } from './models/settings.js'

// Adapters
export type { ProviderAdapter, AdapterCapabilities, RequestOptions } from './models/provider.js'
export { BaseAdapter } from './models/model.js'
export type { BaseAdapterOptions } from './models/model.js'
export { LocalInferenceAdapter } from './models/local.js'
export type { LocalInferenceAdapterOptions } from './models/local.js'
export { OpenAIAdapter } from './models/openai.js'
export type { OpenAIAdapterOptions } from './models/openai.js'
export { AnthropicAdapter } from './models/anthropic.js'
export type { AnthropicAdapterOptions } from './models/anthropic.js'

// Client
export { ModelClient } from './client/model-client.js'
export type { ModelClientOptions, CallOptions, GenerationInput } from './client/model-client.js'
export { RetryPolicy, DEFAULT_RETRY_POLICY } from './client/retry.js'
export type { RetryPolicyConfig } from './client/retry.js'
export type {
  ClientEvent,
  ClientOperation,
  AttemptStartEvent,
  AttemptFailureEvent,
  RetryScheduledEvent,
  AttemptSuccessEvent,
} from './client/events.js'

// Registry
export { ClientRegistry, getDefaultRegistry, resetDefaultRegistry } from './registry/client-registry.js'
export type {
  AdapterFactory,
  AdapterFactoryContext,
  ProviderRegistration,
  ClientRegistryOptions,
  RegistryStats,
} from './registry/client-registry.js'

// Convenience calls
export { quickGenerate, quickChat, quickGenerateStream, quickChatStream, DEFAULT_QUICK_PROVIDER } from './quick.js'
export type { QuickOptions } from './quick.js'
