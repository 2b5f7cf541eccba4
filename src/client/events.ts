import type { ModelClientError } from '../errors.js'

/**
 * Operation a client call performs.
 */
export type ClientOperation = 'generate' | 'chat'

/**
 * Emitted before each attempt reaches the adapter.
 */
export interface AttemptStartEvent {
  type: 'attemptStartEvent'
  operation: ClientOperation
  /**
   * 1-based attempt number.
   */
  attempt: number
  maxAttempts: number
}

/**
 * Emitted when an attempt fails, retryable or not.
 */
export interface AttemptFailureEvent {
  type: 'attemptFailureEvent'
  operation: ClientOperation
  attempt: number
  error: ModelClientError
}

/**
 * Emitted when a failed attempt will be retried, before the backoff delay.
 */
export interface RetryScheduledEvent {
  type: 'retryScheduledEvent'
  operation: ClientOperation
  /**
   * The attempt that failed.
   */
  attempt: number
  delayMs: number
  error: ModelClientError
}

/**
 * Emitted when an attempt produced a result. The result itself is the generator's return value.
 */
export interface AttemptSuccessEvent {
  type: 'attemptSuccessEvent'
  operation: ClientOperation
  attempt: number
  latencyMs: number
}

/**
 * Lifecycle events yielded by the streaming client calls.
 */
export type ClientEvent = AttemptStartEvent | AttemptFailureEvent | RetryScheduledEvent | AttemptSuccessEvent
