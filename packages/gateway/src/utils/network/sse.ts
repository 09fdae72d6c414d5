import type * as http from 'node:http'

/**
 * Utility functions for handling Server-Sent Events (SSE) streams
 */

export const DONE_SENTINEL = '[DONE]'

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
  'Access-Control-Allow-Origin': '*',
} as const

/**
 * Check if a response is a Server-Sent Event stream
 */
export function isSSEResponse(headers: http.IncomingHttpHeaders): boolean {
  const contentType = headers['content-type'] ?? ''
  return contentType.includes('text/event-stream')
}

/**
 * Incremental decoder for `data:` lines. Bytes are fed as they arrive; a line split
 * across two reads is held back until its newline shows up.
 */
export class SSEDecoder {
  private buffer = ''
  private decoder = new TextDecoder()

  push(chunk: Uint8Array | string): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true })
    const lines = this.buffer.split('\n')
    this.buffer = lines.pop() ?? ''
    return this.extract(lines)
  }

  /**
   * Flush whatever remains once the source has ended
   */
  end(): string[] {
    const rest = this.buffer + this.decoder.decode()
    this.buffer = ''
    return rest ? this.extract([rest]) : []
  }

  private extract(lines: string[]): string[] {
    const payloads: string[] = []
    for (const raw of lines) {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw
      if (!line.startsWith('data:')) {
        continue
      }
      payloads.push(line.slice(5).trimStart())
    }
    return payloads
  }
}

export function formatSSEEvent(data: unknown): string {
  return `data: ${typeof data === 'string' ? data : JSON.stringify(data)}\n\n`
}

/**
 * Write one event and wait for `drain` when the socket buffer is full
 */
export async function writeSSEEvent(res: http.ServerResponse, data: unknown): Promise<void> {
  if (res.destroyed || res.writableEnded) {
    return
  }
  if (!res.write(formatSSEEvent(data))) {
    await new Promise<void>((resolve) => {
      const done = (): void => {
        res.off('drain', done)
        res.off('close', done)
        resolve()
      }
      res.once('drain', done)
      res.once('close', done)
    })
  }
}
