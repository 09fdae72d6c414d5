export type ChatRole = 'system' | 'user' | 'assistant'

export interface ChatMessage {
  role: ChatRole
  content: string
}

export interface SamplingParams {
  temperature?: number
  maxTokens?: number
  // Upstream extensions passed through untouched
  enableThinking?: boolean
  thinkingBudget?: number
  tools?: unknown[]
  toolChoice?: unknown
}

export interface ChatRequest {
  model: string
  messages: ChatMessage[]
  params: SamplingParams
  stream: boolean
}

export interface Usage {
  prompt_tokens: number
  completion_tokens: number
  total_tokens: number
}

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter'

/**
 * Internal result of a non-streaming upstream call
 */
export interface ChatResponse {
  id: string
  model: string
  content: string
  finishReason: FinishReason
  usage: Usage
}

export type StreamChunk =
  | { type: 'delta', content: string }
  | { type: 'finish', finishReason: FinishReason }

// Wire shapes emitted to callers

export interface ChatCompletionResponse {
  id: string
  object: 'chat.completion'
  created: number
  model: string
  choices: Array<{
    index: number
    message: { role: 'assistant', content: string }
    finish_reason: FinishReason
  }>
  usage: Usage
}

export interface ChatCompletionChunk {
  id: string
  object: 'chat.completion.chunk'
  created: number
  model: string
  choices: Array<{
    index: number
    delta: { role?: 'assistant', content?: string }
    finish_reason: FinishReason | null
  }>
}

export interface ModelEntry {
  id: string
  object: 'model'
  created: number
  owned_by: string
}

export interface ModelList {
  object: 'list'
  data: ModelEntry[]
}

export interface ErrorBody {
  error: {
    message: string
    type: string
  }
}
