import type { CredentialManager } from '../auth/credential-manager'
import type { CredentialStatus } from '../auth/credential-store'
import type { ModelResolver } from '../models/resolver'
import type {
  ChatCompletionChunk,
  ChatCompletionResponse,
  ChatMessage,
  ChatRequest,
  ErrorBody,
  FinishReason,
  ModelList,
} from '../types/openai'
import type { UpstreamClient } from './upstream-client'
import { Buffer } from 'node:buffer'
import { randomUUID } from 'node:crypto'
import * as http from 'node:http'
import { z } from 'zod'
import { UILogger } from '../utils/cli/ui'
import {
  AuthenticationError,
  AuthorizationError,
  errorMessage,
  GatewayError,
  ValidationError,
} from '../utils/errors'
import { fileLogger } from '../utils/logging/file-logger'
import { DONE_SENTINEL, formatSSEEvent, SSE_HEADERS, writeSSEEvent } from '../utils/network/sse'

export const SERVICE_NAME = 'qwen-gateway'
const MAX_BODY_BYTES = 10 * 1024 * 1024

export type ChatCompleter = Pick<UpstreamClient, 'complete' | 'completeStream'>
export type CredentialCoordinator = Pick<CredentialManager, 'invalidateAndRefresh' | 'isRefreshing' | 'getRefreshCount' | 'status'>

export interface GatewayOptions {
  credentials: CredentialCoordinator
  client: ChatCompleter
  resolver: ModelResolver
  version: string
  verbose?: boolean
  debug?: boolean
}

export interface GatewayStatus {
  listening: boolean
  port?: number
  uptimeSeconds: number
  activeRequests: number
  totalRequests: number
  credential: Omit<CredentialStatus, 'filePath'> & { refreshing: boolean, refreshCount: number }
}

const contentPartSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
})

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string(), z.array(contentPartSchema)]),
})

export const chatRequestSchema = z.object({
  model: z.string().nullish(),
  messages: z.array(messageSchema).min(1, 'must be a non-empty array').optional(),
  prompt: z.string().min(1).optional(),
  input: z.string().min(1).optional(),
  stream: z.boolean().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  enable_thinking: z.boolean().optional(),
  thinking_budget: z.number().int().positive().optional(),
  tools: z.array(z.unknown()).optional(),
  tool_choice: z.unknown().optional(),
})

type ChatRequestBody = z.infer<typeof chatRequestSchema>

type MessageContent = z.infer<typeof messageSchema>['content']

function flattenContent(content: MessageContent): string {
  if (typeof content === 'string') {
    return content
  }
  return content
    .filter(part => part.type === 'text' && part.text !== undefined)
    .map(part => part.text ?? '')
    .join('')
}

/**
 * Turn a validated body into the internal request. `prompt` and `input` stand in for
 * `messages` as a single user turn.
 */
export function normalizeChatRequest(body: ChatRequestBody): ChatRequest {
  let messages: ChatMessage[]
  if (body.messages) {
    messages = body.messages.map(message => ({ role: message.role, content: flattenContent(message.content) }))
  }
  else {
    const text = body.prompt ?? body.input
    if (!text) {
      throw new ValidationError('messages must be a non-empty array')
    }
    messages = [{ role: 'user', content: text }]
  }

  return {
    model: body.model ?? '',
    messages,
    stream: body.stream ?? false,
    params: {
      temperature: body.temperature,
      maxTokens: body.max_tokens,
      enableThinking: body.enable_thinking,
      thinkingBudget: body.thinking_budget,
      tools: body.tools,
      toolChoice: body.tool_choice,
    },
  }
}

function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0

    req.on('data', (chunk: Buffer) => {
      size += chunk.length
      if (size <= MAX_BODY_BYTES) {
        chunks.push(chunk)
      }
    })
    req.on('end', () => {
      if (size > MAX_BODY_BYTES) {
        reject(new ValidationError('Request body too large', 413))
        return
      }
      const raw = Buffer.concat(chunks).toString('utf-8')
      if (!raw.trim()) {
        reject(new ValidationError('Request body must be a JSON object'))
        return
      }
      try {
        resolve(JSON.parse(raw))
      }
      catch {
        reject(new ValidationError('Request body is not valid JSON'))
      }
    })
    req.on('error', reject)
  })
}

const ROUTES: Record<string, string[]> = {
  '/': ['GET'],
  '/health': ['GET'],
  '/health/detailed': ['GET'],
  '/v1/models': ['GET'],
  '/v1/chat/completions': ['POST'],
  '/v1/completions': ['POST'],
}

/**
 * HTTP server speaking the OpenAI chat-completion protocol in front of the upstream
 */
export class GatewayServer {
  private ui: UILogger
  private server?: http.Server
  private port?: number
  private startedAt = Date.now()
  private activeRequests = 0
  private totalRequests = 0
  private readonly credentials: CredentialCoordinator
  private readonly client: ChatCompleter
  private readonly resolver: ModelResolver
  private readonly version: string
  private readonly debug: boolean

  constructor(options: GatewayOptions) {
    this.credentials = options.credentials
    this.client = options.client
    this.resolver = options.resolver
    this.version = options.version
    this.debug = options.debug ?? false
    this.ui = new UILogger(options.verbose || this.debug)
  }

  async start(port = 7050, host = '0.0.0.0'): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        void this.handleRequest(req, res)
      })

      server.once('error', (error) => {
        this.ui.error(`❌ Failed to start gateway: ${error.message}`)
        reject(error)
      })

      server.listen(port, host, () => {
        const address = server.address()
        const boundPort = typeof address === 'object' && address !== null ? address.port : port
        this.port = boundPort
        this.server = server
        this.startedAt = Date.now()
        this.ui.success(`🚀 Gateway listening on http://${host}:${boundPort}`)
        fileLogger.info('GATEWAY', 'Server started', { host, port: boundPort })
        resolve(boundPort)
      })
    })
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) {
      return
    }
    this.server = undefined

    await new Promise<void>((resolve, reject) => {
      server.close(error => error ? reject(error) : resolve())
      server.closeAllConnections()
    })
    fileLogger.info('GATEWAY', 'Server stopped')
  }

  getStatus(): GatewayStatus {
    const { filePath: _filePath, ...credential } = this.credentials.status()
    return {
      listening: this.server !== undefined,
      port: this.port,
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
      activeRequests: this.activeRequests,
      totalRequests: this.totalRequests,
      credential: {
        ...credential,
        refreshing: this.credentials.isRefreshing(),
        refreshCount: this.credentials.getRefreshCount(),
      },
    }
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const startedAt = Date.now()
    this.activeRequests++
    this.totalRequests++

    try {
      if (this.debug) {
        fileLogger.logRequest(req.method ?? 'UNKNOWN', req.url ?? '/', req.headers)
      }

      if (req.method === 'OPTIONS') {
        res.writeHead(204, {
          'Access-Control-Allow-Origin': '*',
          'Access-Control-Allow-Methods': 'POST, OPTIONS, GET',
          'Access-Control-Allow-Headers': 'Content-Type, Authorization, x-api-key',
          'Access-Control-Max-Age': '86400',
        })
        res.end()
        return
      }

      const pathname = new URL(req.url ?? '/', 'http://localhost').pathname.replace(/(.)\/+$/, '$1')
      this.ui.verbose(`Handling ${req.method} ${pathname}`)

      const methods = ROUTES[pathname]
      if (!methods) {
        this.sendError(res, 404, 'not_found', `No route for ${pathname}`)
        return
      }
      if (!methods.includes(req.method ?? '')) {
        this.sendError(res, 405, 'method_not_allowed', `${req.method} is not allowed on ${pathname}`)
        return
      }

      switch (pathname) {
        case '/':
          this.sendJson(res, 200, {
            status: 'ok',
            service: SERVICE_NAME,
            version: this.version,
            endpoints: Object.keys(ROUTES),
          })
          return
        case '/health':
          this.sendJson(res, 200, {
            status: 'ok',
            service: SERVICE_NAME,
            version: this.version,
            uptime: Math.floor((Date.now() - this.startedAt) / 1000),
          })
          return
        case '/health/detailed':
          this.sendJson(res, 200, {
            status: 'ok',
            service: SERVICE_NAME,
            version: this.version,
            ...this.getStatus(),
          })
          return
        case '/v1/models':
          this.sendJson(res, 200, { object: 'list', data: this.resolver.list() } satisfies ModelList)
          return
        default:
          await this.handleChatCompletion(req, res)
      }
    }
    catch (error) {
      this.handleError(res, error)
    }
    finally {
      this.activeRequests--
      if (this.debug) {
        fileLogger.logResponse(res.statusCode, Date.now() - startedAt)
      }
    }
  }

  private async handleChatCompletion(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const parsed = chatRequestSchema.safeParse(await readJsonBody(req))
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue?.path.length ? `${issue.path.join('.')}: ` : ''
      throw new ValidationError(`${where}${issue?.message ?? 'Invalid request body'}`)
    }

    const request = normalizeChatRequest(parsed.data)
    const model = this.resolver.resolve(request.model)
    if (request.model !== model) {
      this.ui.verbose(`Model "${request.model || '(none)'}" resolved to ${model}`)
    }

    // Abort the upstream call as soon as the caller goes away
    const abort = new AbortController()
    res.on('close', () => {
      if (!res.writableFinished) {
        abort.abort()
      }
    })

    if (request.stream) {
      await this.streamCompletion(res, request, model, abort.signal)
    }
    else {
      await this.completeOnce(res, request, model, abort.signal)
    }
  }

  private async completeOnce(res: http.ServerResponse, request: ChatRequest, model: string, signal: AbortSignal): Promise<void> {
    const response = await this.withCredentialRetry(() =>
      this.client.complete(model, request.messages, request.params, signal),
    )

    const body: ChatCompletionResponse = {
      id: response.id,
      object: 'chat.completion',
      created: Math.floor(Date.now() / 1000),
      model,
      choices: [{
        index: 0,
        message: { role: 'assistant', content: response.content },
        finish_reason: response.finishReason,
      }],
      usage: response.usage,
    }
    this.sendJson(res, 200, body)
  }

  private async streamCompletion(res: http.ServerResponse, request: ChatRequest, model: string, signal: AbortSignal): Promise<void> {
    const stream = await this.withCredentialRetry(() =>
      this.client.completeStream(model, request.messages, request.params, signal),
    )

    const id = `chatcmpl-${randomUUID()}`
    const created = Math.floor(Date.now() / 1000)
    const chunk = (delta: ChatCompletionChunk['choices'][number]['delta'], finishReason: FinishReason | null): ChatCompletionChunk => ({
      id,
      object: 'chat.completion.chunk',
      created,
      model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    })

    res.writeHead(200, SSE_HEADERS)
    await writeSSEEvent(res, chunk({ role: 'assistant', content: '' }, null))

    try {
      for await (const part of stream) {
        if (signal.aborted) {
          break
        }
        if (part.type === 'delta') {
          await writeSSEEvent(res, chunk({ content: part.content }, null))
        }
        else {
          await writeSSEEvent(res, chunk({}, part.finishReason))
        }
      }
    }
    catch (error) {
      if (signal.aborted) {
        this.ui.verbose('Client disconnected, upstream stream cancelled')
        return
      }
      this.ui.error(`⚠️ Upstream stream interrupted: ${errorMessage(error)}`)
      fileLogger.logError('STREAM', error, { model })
      const { type, message } = this.describeError(error)
      await writeSSEEvent(res, { error: { message, type } } satisfies ErrorBody)
    }

    if (!signal.aborted && !res.writableEnded) {
      res.end(formatSSEEvent(DONE_SENTINEL))
    }
  }

  /**
   * Run an upstream call; if the credential is rejected, refresh it once and retry once
   */
  private async withCredentialRetry<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation()
    }
    catch (error) {
      if (!(error instanceof AuthorizationError)) {
        throw error
      }
      this.ui.warning('🔑 Upstream rejected the credential, refreshing and retrying once')
      await this.credentials.invalidateAndRefresh(error.rejectedToken)
      return operation()
    }
  }

  private describeError(error: unknown): { status: number, type: string, message: string } {
    if (error instanceof AuthenticationError) {
      // The reason stays in the logs
      return { status: 503, type: 'upstream_unavailable', message: 'Upstream credential is unavailable' }
    }
    if (error instanceof GatewayError) {
      return { status: error.statusCode, type: error.type, message: error.message }
    }
    return { status: 500, type: 'internal_error', message: 'Internal server error' }
  }

  private handleError(res: http.ServerResponse, error: unknown): void {
    if (res.destroyed || res.writableEnded) {
      fileLogger.logError('REQUEST_ABANDONED', error)
      return
    }

    const { status, type, message } = this.describeError(error)
    if (error instanceof AuthenticationError) {
      this.ui.error(`❌ Credential acquisition failed (${error.reason}): ${error.message}`)
    }
    else if (status >= 500) {
      this.ui.error(`⚠️ Request handling error: ${errorMessage(error)}`)
    }
    fileLogger.logError('REQUEST_ERROR', error, { status, type })

    if (res.headersSent) {
      res.end()
      return
    }
    this.sendError(res, status, type, message)
  }

  private sendError(res: http.ServerResponse, status: number, type: string, message: string): void {
    this.sendJson(res, status, { error: { message, type } } satisfies ErrorBody)
  }

  private sendJson(res: http.ServerResponse, status: number, body: unknown): void {
    const payload = JSON.stringify(body)
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload).toString(),
      'Access-Control-Allow-Origin': '*',
    })
    res.end(payload)
  }
}
