import type { Credential } from '../auth/types'
import type { ChatMessage, ChatResponse, FinishReason, SamplingParams, StreamChunk } from '../types/openai'
import type { RetryPolicy } from '../utils/retry'
import { Buffer } from 'node:buffer'
import { randomUUID } from 'node:crypto'
import * as http from 'node:http'
import * as https from 'node:https'
import { HttpProxyAgent } from 'http-proxy-agent'
import { HttpsProxyAgent } from 'https-proxy-agent'
import { z } from 'zod'
import { UILogger } from '../utils/cli/ui'
import {
  AuthorizationError,
  errorMessage,
  GatewayError,
  RetryableUpstreamError,
  StreamInterruptedError,
  ValidationError,
} from '../utils/errors'
import { fileLogger } from '../utils/logging/file-logger'
import { DONE_SENTINEL, isSSEResponse, SSEDecoder } from '../utils/network/sse'
import { UPSTREAM_RETRY_POLICY, withRetry } from '../utils/retry'
import { estimateUsage } from '../utils/token-counter'

export const DEFAULT_UPSTREAM_BASE_URL = 'https://qwen.aikit.club/v1'

export interface CredentialProvider {
  ensureValid: () => Promise<Credential>
}

export interface UpstreamClientOptions {
  credentials: CredentialProvider
  baseUrl?: string
  timeoutMs?: number
  retryPolicy?: RetryPolicy
  proxyUrl?: string
  verbose?: boolean
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
})

const completionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).optional(),
    finish_reason: z.string().nullish(),
  })).optional(),
  output: z.object({ text: z.string() }).optional(),
  usage: usageSchema.optional(),
})

const chunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullish() }).optional(),
    finish_reason: z.string().nullish(),
  })).optional(),
  error: z.object({ message: z.string().optional() }).passthrough().optional(),
})

const errorBodySchema = z.union([
  z.object({ error: z.object({ message: z.string() }) }),
  z.object({ error: z.string() }),
  z.object({ detail: z.string() }),
  z.object({ message: z.string() }),
])

function toFinishReason(value: string | null | undefined): FinishReason | undefined {
  switch (value) {
    case 'stop':
    case 'length':
    case 'tool_calls':
    case 'content_filter':
      return value
    case null:
    case undefined:
    case '':
      return undefined
    default:
      return 'stop'
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw)
  }
  catch {
    return undefined
  }
}

function extractErrorMessage(raw: string): string {
  const parsed = errorBodySchema.safeParse(parseJson(raw))
  if (!parsed.success) {
    return raw.slice(0, 200) || 'Upstream rejected the request'
  }
  const body = parsed.data
  if ('detail' in body) {
    return body.detail
  }
  if ('error' in body) {
    return typeof body.error === 'string' ? body.error : body.error.message
  }
  return body.message
}

function readBody(res: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    res.on('data', (chunk: Buffer) => chunks.push(chunk))
    res.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')))
    res.on('error', reject)
    res.on('aborted', () => reject(new StreamInterruptedError('Upstream closed the connection mid-response')))
  })
}

/**
 * Client for the upstream chat-completion endpoint. Transient failures are retried with
 * the configured policy; authorization failures are returned to the caller untouched.
 */
export class UpstreamClient {
  private readonly credentials: CredentialProvider
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly retryPolicy: RetryPolicy
  private readonly sleep?: UpstreamClientOptions['sleep']
  private readonly ui: UILogger
  private httpAgent?: http.Agent
  private httpsAgent?: https.Agent

  constructor(options: UpstreamClientOptions) {
    this.credentials = options.credentials
    this.baseUrl = (options.baseUrl ?? DEFAULT_UPSTREAM_BASE_URL).replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? 60000
    this.retryPolicy = options.retryPolicy ?? UPSTREAM_RETRY_POLICY
    this.sleep = options.sleep
    this.ui = new UILogger(options.verbose)

    if (options.proxyUrl) {
      this.httpAgent = new HttpProxyAgent(options.proxyUrl)
      this.httpsAgent = new HttpsProxyAgent(options.proxyUrl)
      fileLogger.debug('UPSTREAM', `HTTP/HTTPS proxy configured: ${options.proxyUrl}`)
    }
  }

  async complete(
    model: string,
    messages: ChatMessage[],
    params: SamplingParams = {},
    signal?: AbortSignal,
  ): Promise<ChatResponse> {
    const response = await this.sendWithRetry(this.buildBody(model, messages, params, false), signal)
    const raw = await readBody(response)
    return this.parseCompletion(raw, model, messages)
  }

  /**
   * Resolves once the upstream has accepted the stream, so authorization and transient
   * failures surface before any byte reaches the caller.
   */
  async completeStream(
    model: string,
    messages: ChatMessage[],
    params: SamplingParams = {},
    signal?: AbortSignal,
  ): Promise<AsyncIterable<StreamChunk>> {
    const response = await this.sendWithRetry(this.buildBody(model, messages, params, true), signal)

    if (!isSSEResponse(response.headers)) {
      // Some deployments answer a stream request with a plain completion
      const completion = this.parseCompletion(await readBody(response), model, messages)
      return singleCompletionStream(completion)
    }

    return this.readStream(response, signal)
  }

  private buildBody(model: string, messages: ChatMessage[], params: SamplingParams, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = { model, messages, stream }
    if (params.temperature !== undefined)
      body.temperature = params.temperature
    if (params.maxTokens !== undefined)
      body.max_tokens = params.maxTokens
    if (params.enableThinking !== undefined)
      body.enable_thinking = params.enableThinking
    if (params.thinkingBudget !== undefined)
      body.thinking_budget = params.thinkingBudget
    if (params.tools !== undefined)
      body.tools = params.tools
    if (params.toolChoice !== undefined)
      body.tool_choice = params.toolChoice
    return body
  }

  private sendWithRetry(body: Record<string, unknown>, signal?: AbortSignal): Promise<http.IncomingMessage> {
    return withRetry(async (attempt) => {
      // Re-read each attempt: a refresh may have landed in between
      const credential = await this.credentials.ensureValid()
      fileLogger.debug('UPSTREAM', `Attempt ${attempt}/${this.retryPolicy.maxAttempts}`, { model: body.model, stream: body.stream })
      return this.send(body, credential, signal)
    }, this.retryPolicy, {
      signal,
      sleep: this.sleep,
      shouldRetry: error => error instanceof RetryableUpstreamError,
      onRetry: (error, attempt, delayMs) => {
        this.ui.warning(`⚠️ Upstream attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`)
        fileLogger.warn('UPSTREAM_RETRY', errorMessage(error), { attempt, delayMs })
      },
    })
  }

  private send(body: Record<string, unknown>, credential: Credential, signal?: AbortSignal): Promise<http.IncomingMessage> {
    const targetUrl = new URL(`${this.baseUrl}/chat/completions`)
    const isHttps = targetUrl.protocol === 'https:'
    const httpModule = isHttps ? https : http
    const payload = JSON.stringify(body)

    const headers = {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload).toString(),
      'Accept': body.stream ? 'text/event-stream' : 'application/json',
      'Authorization': `Bearer ${credential.token}`,
    }
    fileLogger.logRequest('POST', targetUrl.toString(), headers, body)

    return new Promise((resolve, reject) => {
      const startedAt = Date.now()
      const upstreamReq = httpModule.request(targetUrl, {
        method: 'POST',
        headers,
        timeout: this.timeoutMs,
        agent: isHttps ? this.httpsAgent : this.httpAgent,
        signal,
      }, (upstreamRes) => {
        const status = upstreamRes.statusCode ?? 0
        fileLogger.logResponse(status, Date.now() - startedAt, upstreamRes.headers)

        if (status >= 200 && status < 300) {
          resolve(upstreamRes)
          return
        }

        readBody(upstreamRes).then((raw) => {
          fileLogger.warn('UPSTREAM', `Upstream answered ${status}`, raw)
          reject(this.mapStatus(status, raw, credential))
        }, reject)
      })

      upstreamReq.on('timeout', () => {
        upstreamReq.destroy(new RetryableUpstreamError('timeout', `Upstream did not respond within ${this.timeoutMs}ms`))
      })

      upstreamReq.on('error', (error) => {
        if (error instanceof GatewayError || signal?.aborted) {
          reject(error)
          return
        }
        reject(new RetryableUpstreamError('network', `Upstream connection failed: ${error.message}`))
      })

      upstreamReq.end(payload)
    })
  }

  private mapStatus(status: number, raw: string, credential: Credential): GatewayError {
    if (status === 401 || status === 403) {
      return new AuthorizationError(credential.token, status)
    }
    if (status === 429 || status >= 500) {
      return new RetryableUpstreamError('status', `Upstream returned HTTP ${status}`, status)
    }
    return new ValidationError(extractErrorMessage(raw), status)
  }

  private parseCompletion(raw: string, model: string, messages: ChatMessage[]): ChatResponse {
    const parsed = completionSchema.safeParse(parseJson(raw))
    if (!parsed.success) {
      fileLogger.error('UPSTREAM', 'Malformed completion body', raw)
      throw new GatewayError('Malformed response from upstream', 502, 'upstream_error')
    }

    const data = parsed.data
    const choice = data.choices?.[0]
    const content = choice?.message?.content ?? data.output?.text
    if (content === undefined || content === null) {
      throw new GatewayError('Upstream response carried no completion', 502, 'upstream_error')
    }

    return {
      id: data.id ?? `chatcmpl-${randomUUID()}`,
      model: data.model ?? model,
      content,
      finishReason: toFinishReason(choice?.finish_reason) ?? 'stop',
      usage: data.usage ?? estimateUsage(messages, content),
    }
  }

  private async* readStream(response: http.IncomingMessage, signal?: AbortSignal): AsyncGenerator<StreamChunk> {
    const decoder = new SSEDecoder()
    const state: StreamState = { done: false }

    try {
      for await (const chunk of response) {
        const bytes: unknown = chunk
        if (!(bytes instanceof Uint8Array)) {
          continue
        }
        for (const data of decoder.push(bytes)) {
          yield* this.handleEvent(data, state)
          if (state.done) {
            break
          }
        }
        if (state.done) {
          break
        }
      }

      // A last event without its trailing newline is still part of the reply
      if (!state.done) {
        for (const data of decoder.end()) {
          yield* this.handleEvent(data, state)
          if (state.done) {
            break
          }
        }
      }
    }
    catch (error) {
      if (signal?.aborted || error instanceof GatewayError) {
        throw error
      }
      throw new StreamInterruptedError(`Upstream stream failed: ${errorMessage(error)}`)
    }
    finally {
      if (!response.complete) {
        response.destroy()
      }
    }

    if (!state.done && !state.finishReason && !response.complete) {
      throw new StreamInterruptedError()
    }

    yield { type: 'finish', finishReason: state.finishReason ?? 'stop' }
  }

  private* handleEvent(data: string, state: StreamState): Generator<StreamChunk> {
    if (data === DONE_SENTINEL) {
      state.done = true
      return
    }
    const event = this.parseChunk(data)
    if (!event) {
      return
    }
    if (event.content) {
      yield { type: 'delta', content: event.content }
    }
    state.finishReason = event.finishReason ?? state.finishReason
  }

  private parseChunk(data: string): { content?: string, finishReason?: FinishReason } | undefined {
    const parsed = chunkSchema.safeParse(parseJson(data))
    if (!parsed.success) {
      fileLogger.debug('UPSTREAM_STREAM', 'Skipping unrecognized stream event', data)
      return undefined
    }
    if (parsed.data.error) {
      throw new StreamInterruptedError(parsed.data.error.message ?? 'Upstream reported an error mid-stream')
    }
    const choice = parsed.data.choices?.[0]
    return {
      content: choice?.delta?.content ?? undefined,
      finishReason: toFinishReason(choice?.finish_reason),
    }
  }
}

interface StreamState {
  done: boolean
  finishReason?: FinishReason
}

async function* singleCompletionStream(completion: ChatResponse): AsyncGenerator<StreamChunk> {
  if (completion.content) {
    yield { type: 'delta', content: completion.content }
  }
  yield { type: 'finish', finishReason: completion.finishReason }
}
