import { z } from 'zod'
import { InvalidRequestError } from '../errors.js'
import { summarizeZodError } from '../utils/zod.js'

/**
 * Role of a message in a conversation.
 */
export type Role = 'user' | 'assistant' | 'system'

/**
 * One turn of a chat request.
 *
 * A chat request is an ordered, non-empty list of messages. Adapters forward the order
 * verbatim.
 */
export interface Message {
  /**
   * The role of the message sender.
   */
  role: Role

  /**
   * Plain text content of the turn.
   */
  content: string
}

const MessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
})

const MessageListSchema = z.array(MessageSchema)

/**
 * Validates a chat request before any network I/O.
 *
 * @param messages - Candidate message list
 * @returns A shallow copy of the list, safe to hand to an adapter
 * @throws InvalidRequestError when the list is empty or a message is malformed
 */
export function validateMessages(messages: readonly Message[], provider?: string): Message[] {
  if (!Array.isArray(messages) || messages.length === 0) {
    throw new InvalidRequestError('Chat requires at least one message', { provider })
  }

  const parsed = MessageListSchema.safeParse(messages)
  if (!parsed.success) {
    const issue = summarizeZodError(parsed.error)
    throw new InvalidRequestError(`Malformed message at ${issue.path}: ${issue.message}`, {
      provider,
      cause: parsed.error,
    })
  }

  return parsed.data
}

/**
 * Validates a completion prompt before any network I/O.
 *
 * @throws InvalidRequestError when the prompt is not a string or is blank
 */
export function validatePrompt(prompt: string, provider?: string): string {
  if (typeof prompt !== 'string' || prompt.trim() === '') {
    throw new InvalidRequestError('Prompt must be a non-empty string', { provider })
  }
  return prompt
}

/**
 * Helper for the common single-turn case.
 */
export function userMessage(content: string): Message {
  return { role: 'user', content }
}
