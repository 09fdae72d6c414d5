import type { Credential } from '../../src/auth/types'
import type { StreamChunk } from '../../src/types/openai'
import { afterEach, describe, expect, it } from 'vitest'
import { createCredential } from '../../src/auth/jwt'
import { UpstreamClient } from '../../src/core/upstream-client'
import {
  AuthorizationError,
  RetryableUpstreamError,
  StreamInterruptedError,
  ValidationError,
} from '../../src/utils/errors'
import { completionBody, FakeUpstream, sendJson, startSse, streamEvent } from '../helpers/fake-upstream'
import { makeJwt, nowSeconds } from '../helpers/tokens'

const messages = [{ role: 'user' as const, content: 'Hello' }]

async function collect(stream: AsyncIterable<StreamChunk>, into: StreamChunk[] = []): Promise<StreamChunk[]> {
  for await (const chunk of stream) {
    into.push(chunk)
  }
  return into
}

describe('upstreamClient', () => {
  let upstream: FakeUpstream | undefined
  const credential: Credential = createCredential(makeJwt(nowSeconds() + 3600), 'extracted')

  afterEach(async () => {
    await upstream?.stop()
    upstream = undefined
  })

  async function createClient(handler: ConstructorParameters<typeof FakeUpstream>[0], timeoutMs = 5000): Promise<UpstreamClient> {
    upstream = new FakeUpstream(handler)
    const baseUrl = await upstream.start()
    return new UpstreamClient({
      credentials: { ensureValid: async () => credential },
      baseUrl,
      timeoutMs,
      sleep: async () => {},
    })
  }

  it('should send an authorized request and map the completion', async () => {
    const client = await createClient((_req, res) => sendJson(res, 200, completionBody('Hi there')))

    const response = await client.complete('qwen3-max', messages, { temperature: 0.2, maxTokens: 64, enableThinking: true })

    expect(response).toEqual({
      id: 'chatcmpl-upstream-1',
      model: 'qwen3-max',
      content: 'Hi there',
      finishReason: 'stop',
      usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
    })
    const request = upstream?.requests[0]
    expect(request?.url).toBe('/v1/chat/completions')
    expect(request?.headers.authorization).toBe(`Bearer ${credential.token}`)
    expect(request?.body).toEqual({
      model: 'qwen3-max',
      messages,
      stream: false,
      temperature: 0.2,
      max_tokens: 64,
      enable_thinking: true,
    })
  })

  it('should accept the legacy output.text shape and estimate usage', async () => {
    const client = await createClient((_req, res) => sendJson(res, 200, { output: { text: 'Legacy answer' } }))

    const response = await client.complete('qwen3-max', messages)

    expect(response.content).toBe('Legacy answer')
    expect(response.id).toMatch(/^chatcmpl-/)
    expect(response.usage.completion_tokens).toBeGreaterThan(0)
    expect(response.usage.total_tokens).toBe(response.usage.prompt_tokens + response.usage.completion_tokens)
  })

  it('should surface 401 as an authorization error without retrying', async () => {
    const client = await createClient((_req, res) => sendJson(res, 401, { error: { message: 'token expired' } }))

    const error: unknown = await client.complete('qwen3-max', messages).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AuthorizationError)
    if (error instanceof AuthorizationError) {
      expect(error.rejectedToken).toBe(credential.token)
      expect(error.upstreamStatus).toBe(401)
    }
    expect(upstream?.requests).toHaveLength(1)
  })

  it('should retry transient failures and then succeed', async () => {
    const client = await createClient((_req, res, index) => {
      if (index < 2) {
        sendJson(res, 503, { error: { message: 'busy' } })
        return
      }
      sendJson(res, 200, completionBody('Recovered'))
    })

    const response = await client.complete('qwen3-max', messages)

    expect(response.content).toBe('Recovered')
    expect(upstream?.requests).toHaveLength(3)
  })

  it('should give up after the retry budget', async () => {
    const client = await createClient((_req, res) => sendJson(res, 429, { error: { message: 'slow down' } }))

    await expect(client.complete('qwen3-max', messages)).rejects.toBeInstanceOf(RetryableUpstreamError)
    expect(upstream?.requests).toHaveLength(3)
  })

  it('should pass other client errors through with their status', async () => {
    const client = await createClient((_req, res) => sendJson(res, 400, { error: { message: 'bad temperature' } }))

    const error: unknown = await client.complete('qwen3-max', messages).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ValidationError)
    if (error instanceof ValidationError) {
      expect(error.statusCode).toBe(400)
      expect(error.message).toBe('bad temperature')
    }
    expect(upstream?.requests).toHaveLength(1)
  })

  it('should time out an upstream that never answers', async () => {
    const client = await createClient(() => {}, 100)

    const error: unknown = await client.complete('qwen3-max', messages).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RetryableUpstreamError)
    if (error instanceof RetryableUpstreamError) {
      expect(error.reason).toBe('timeout')
      expect(error.statusCode).toBe(504)
    }
  })

  it('should stream deltas across split network writes', async () => {
    const client = await createClient((_req, res) => {
      startSse(res)
      const payload = `${streamEvent('Hel')}${streamEvent('lo')}${streamEvent(null, 'stop')}data: [DONE]\n\n`
      res.write(payload.slice(0, 25))
      setTimeout(() => {
        res.write(payload.slice(25))
        res.end()
      }, 10)
    })

    const chunks = await collect(await client.completeStream('qwen3-max', messages))

    expect(chunks).toEqual([
      { type: 'delta', content: 'Hel' },
      { type: 'delta', content: 'lo' },
      { type: 'finish', finishReason: 'stop' },
    ])
    expect(upstream?.requests[0]?.body).toMatchObject({ stream: true })
    expect(upstream?.requests[0]?.headers.accept).toBe('text/event-stream')
  })

  it('should keep a final event that has no trailing newline', async () => {
    const client = await createClient((_req, res) => {
      startSse(res)
      res.write(streamEvent('Hello '))
      res.end(streamEvent('world', 'stop').trimEnd())
    })

    const chunks = await collect(await client.completeStream('qwen3-max', messages))

    expect(chunks).toEqual([
      { type: 'delta', content: 'Hello ' },
      { type: 'delta', content: 'world' },
      { type: 'finish', finishReason: 'stop' },
    ])
  })

  it('should report an interrupted stream', async () => {
    const client = await createClient((_req, res) => {
      startSse(res)
      res.write(streamEvent('partial'))
      setTimeout(() => res.socket?.destroy(), 20)
    })

    const received: StreamChunk[] = []
    const stream = await client.completeStream('qwen3-max', messages)

    await expect(collect(stream, received)).rejects.toBeInstanceOf(StreamInterruptedError)
    expect(received).toEqual([{ type: 'delta', content: 'partial' }])
  })

  it('should relay a plain JSON reply to a stream request as one delta', async () => {
    const client = await createClient((_req, res) => sendJson(res, 200, completionBody('Whole answer')))

    const chunks = await collect(await client.completeStream('qwen3-max', messages))

    expect(chunks).toEqual([
      { type: 'delta', content: 'Whole answer' },
      { type: 'finish', finishReason: 'stop' },
    ])
  })

  it('should reject a stream request before any chunk when unauthorized', async () => {
    const client = await createClient((_req, res) => sendJson(res, 403, { detail: 'forbidden' }))

    await expect(client.completeStream('qwen3-max', messages)).rejects.toBeInstanceOf(AuthorizationError)
  })
})
