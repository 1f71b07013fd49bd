import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { HttpFetcher, isHealthyResult } from '../http-fetcher'
import type { FetchResult, RetryPolicy } from '../types'
import { createTestLogger } from '../../__tests__/test-logger'

const URL = 'https://moto.example/search?q=PHF1595'

const fastRetry: RetryPolicy = {
  maxAttempts: 2,
  initialDelayMs: 1,
  maxDelayMs: 1,
  backoffMultiplier: 1,
  retryableStatusCodes: [500],
}

function createGate() {
  return {
    acquire: vi.fn(async (_signal?: AbortSignal) => undefined),
    record: vi.fn((_success: boolean) => undefined),
    release: vi.fn(() => undefined),
  }
}

describe('HttpFetcher', () => {
  const originalFetch = globalThis.fetch
  const logger = createTestLogger()
  const sleep = vi.fn(async (_ms: number) => undefined)

  beforeEach(() => {
    vi.restoreAllMocks()
    sleep.mockClear()
  })

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  it('returns the page html and falls back to the request url', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }))

    const result = await new HttpFetcher({ logger }).fetch(URL)

    expect(result).toMatchObject({ status: 'ok', statusCode: 200, html: '<html>ok</html>', finalUrl: URL })
  })

  it('sends the default headers merged with custom ones', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }))
    globalThis.fetch = fetchSpy

    await new HttpFetcher({ logger }).fetch(URL, { headers: { Accept: 'text/html' } })

    const init = fetchSpy.mock.calls[0][1]
    expect(init.headers.Accept).toBe('text/html')
    expect(init.headers['User-Agent']).toContain('refwatch')
    expect(init.redirect).toBe('follow')
  })

  it('retries on retryable status codes', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValueOnce(new Response('fail', { status: 500, statusText: 'Server Error' }))
      .mockResolvedValueOnce(new Response('<html>ok</html>', { status: 200 }))
    globalThis.fetch = fetchSpy

    const result = await new HttpFetcher({ retryPolicy: fastRetry, sleep, logger }).fetch(URL)

    expect(result.status).toBe('ok')
    expect(fetchSpy).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(1)
  })

  it('returns the last error when retries run out', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('fail', { status: 500, statusText: 'Server Error' }))

    const result = await new HttpFetcher({ retryPolicy: fastRetry, sleep, logger }).fetch(URL)

    expect(result).toMatchObject({ status: 'error', statusCode: 500, error: 'HTTP 500: Server Error' })
  })

  it('paces every attempt through the gate', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(new Response('fail', { status: 500 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }))
    const gate = createGate()

    await new HttpFetcher({ retryPolicy: fastRetry, gate, sleep, logger }).fetch(URL)

    expect(gate.acquire).toHaveBeenCalledTimes(2)
    expect(gate.record.mock.calls).toEqual([[false], [true]])
  })

  it('records a failure when the request throws', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('socket hang up'))
    const gate = createGate()

    const result = await new HttpFetcher({ retryPolicy: fastRetry, gate, sleep, logger }).fetch(URL)

    expect(result).toEqual({ status: 'error', durationMs: expect.any(Number), error: 'socket hang up' })
    expect(gate.record.mock.calls).toEqual([[false], [false]])
  })

  it('detects blocked pages without retrying', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValue(new Response('<div class="g-recaptcha"></div>', { status: 403 }))
    globalThis.fetch = fetchSpy
    const gate = createGate()

    const result = await new HttpFetcher({ retryPolicy: fastRetry, gate, sleep, logger }).fetch(URL)

    expect(result.status).toBe('blocked')
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(gate.record).toHaveBeenCalledWith(false)
  })

  it('treats a 404 as a healthy answer', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('not here', { status: 404, statusText: 'Not Found' }))
    const gate = createGate()

    const result = await new HttpFetcher({ gate, sleep, logger }).fetch(URL)

    expect(result).toMatchObject({ status: 'error', statusCode: 404 })
    expect(gate.record).toHaveBeenCalledWith(true)
  })

  it('rejects bodies above the size limit', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('x'.repeat(100), { status: 200 }))

    const result = await new HttpFetcher({ logger }).fetch(URL, { maxSizeBytes: 10 })

    expect(result.status).toBe('too_large')
  })

  it('reports a timeout when the request outlives timeoutMs', async () => {
    globalThis.fetch = vi.fn().mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () =>
            reject(Object.assign(new Error('aborted'), { name: 'AbortError' }))
          )
        })
    )

    const result = await new HttpFetcher({
      retryPolicy: { ...fastRetry, maxAttempts: 1 },
      logger,
    }).fetch(URL, { timeoutMs: 5 })

    expect(result).toMatchObject({ status: 'timeout', error: 'Request timed out after 5ms' })
  })

  it('hands the slot back without an outcome when the caller aborts mid-request', async () => {
    const controller = new AbortController()
    globalThis.fetch = vi.fn().mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () =>
            reject(Object.assign(new Error('aborted'), { name: 'AbortError' }))
          )
          controller.abort()
        })
    )
    const gate = createGate()

    await expect(
      new HttpFetcher({ retryPolicy: fastRetry, gate, sleep, logger }).fetch(URL, { signal: controller.signal })
    ).rejects.toThrow('This operation was aborted')
    expect(gate.acquire).toHaveBeenCalledTimes(1)
    expect(gate.release).toHaveBeenCalledTimes(1)
    expect(gate.record).not.toHaveBeenCalled()
  })

  it('rejects when the caller aborts', async () => {
    const fetchSpy = vi.fn()
    globalThis.fetch = fetchSpy
    const controller = new AbortController()
    controller.abort()

    await expect(
      new HttpFetcher({ sleep, logger }).fetch(URL, { signal: controller.signal })
    ).rejects.toThrow('This operation was aborted')
    expect(fetchSpy).not.toHaveBeenCalled()
  })
})

describe('isHealthyResult', () => {
  const cases: Array<[FetchResult, boolean]> = [
    [{ status: 'ok', durationMs: 1 }, true],
    [{ status: 'error', statusCode: 404, durationMs: 1 }, true],
    [{ status: 'error', statusCode: 403, durationMs: 1 }, false],
    [{ status: 'error', statusCode: 429, durationMs: 1 }, false],
    [{ status: 'error', statusCode: 502, durationMs: 1 }, false],
    [{ status: 'error', durationMs: 1 }, false],
    [{ status: 'timeout', durationMs: 1 }, false],
    [{ status: 'blocked', statusCode: 403, durationMs: 1 }, false],
  ]

  it.each(cases)('%o -> %s', (result, expected) => {
    expect(isHealthyResult(result)).toBe(expected)
  })
})
