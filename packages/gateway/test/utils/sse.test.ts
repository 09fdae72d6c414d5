import { describe, expect, it } from 'vitest'
import { formatSSEEvent, isSSEResponse, SSEDecoder } from '../../src/utils/network/sse'

describe('sse', () => {
  it('should extract data payloads from complete lines', () => {
    const decoder = new SSEDecoder()
    expect(decoder.push('data: {"a":1}\n\ndata: [DONE]\n\n')).toEqual(['{"a":1}', '[DONE]'])
  })

  it('should hold back a line split across reads', () => {
    const decoder = new SSEDecoder()
    expect(decoder.push('data: {"content":"Hel')).toEqual([])
    expect(decoder.push('lo"}\n\n')).toEqual(['{"content":"Hello"}'])
  })

  it('should reassemble multi-byte characters split across byte chunks', () => {
    const decoder = new SSEDecoder()
    const bytes = new TextEncoder().encode('data: héllo\n')
    // split inside the two-byte é
    expect(decoder.push(bytes.slice(0, 8))).toEqual([])
    expect(decoder.push(bytes.slice(8))).toEqual(['héllo'])
  })

  it('should ignore comments, event names and carriage returns', () => {
    const decoder = new SSEDecoder()
    expect(decoder.push(': keep-alive\r\nevent: message\r\ndata: x\r\n\r\n')).toEqual(['x'])
  })

  it('should flush a trailing line without newline at end', () => {
    const decoder = new SSEDecoder()
    expect(decoder.push('data: tail')).toEqual([])
    expect(decoder.end()).toEqual(['tail'])
  })

  it('should format events', () => {
    expect(formatSSEEvent('[DONE]')).toBe('data: [DONE]\n\n')
    expect(formatSSEEvent({ a: 1 })).toBe('data: {"a":1}\n\n')
  })

  it('should detect event-stream responses', () => {
    expect(isSSEResponse({ 'content-type': 'text/event-stream; charset=utf-8' })).toBe(true)
    expect(isSSEResponse({ 'content-type': 'application/json' })).toBe(false)
    expect(isSSEResponse({})).toBe(false)
  })
})
