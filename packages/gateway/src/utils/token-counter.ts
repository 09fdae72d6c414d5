import type { ChatMessage, Usage } from '../types/openai'
import { encode } from 'gpt-tokenizer'

// Per-message framing overhead of the chat format
const TOKENS_PER_MESSAGE = 3
const TOKENS_PER_REPLY = 3

/**
 * Calculate token count for a list of chat messages
 */
export function countMessageTokens(messages: ChatMessage[]): number {
  let tokenCount = 0

  for (const message of messages) {
    tokenCount += TOKENS_PER_MESSAGE
    tokenCount += encode(message.role).length
    tokenCount += encode(message.content).length
  }

  return tokenCount + TOKENS_PER_REPLY
}

export function countTextTokens(text: string): number {
  return text ? encode(text).length : 0
}

/**
 * Estimate usage when the upstream reply carries none
 */
export function estimateUsage(messages: ChatMessage[], completion: string): Usage {
  const promptTokens = countMessageTokens(messages)
  const completionTokens = countTextTokens(completion)
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
  }
}
