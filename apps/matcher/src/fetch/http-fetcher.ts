/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch API for HTTP requests.
 * Supports timeout, size limits, retries and blocked-page detection.
 *
 * With a gate configured, every attempt (retries included) is paced by it:
 * acquire() before the request, record() after it, also when it throws.
 */

import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import type { FetchOptions, FetchResult, Fetcher, RequestGate, RetryPolicy } from './types'
import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_SIZE_BYTES,
  DEFAULT_RETRY_POLICY,
} from './types'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Pacing for every attempt, usually the store's rate limiter */
  gate?: RequestGate

  /** Default timeout when the call does not pass one */
  timeoutMs?: number

  /** Delay between retries; replaced in tests */
  sleep?: (ms: number) => Promise<void>

  logger?: ILogger
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
  'rate limit',
]

/**
 * Whether a result says the store is answering normally. A 404 is a normal
 * answer; blocks, timeouts, throttling and server errors are not.
 */
export function isHealthyResult(result: FetchResult): boolean {
  if (result.status === 'ok') return true
  if (result.status !== 'error' || result.statusCode === undefined) return false

  const code = result.statusCode
  return code >= 400 && code < 500 && code !== 403 && code !== 429
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly gate?: RequestGate
  private readonly timeoutMs: number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.gate = options.gate
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.sleep = options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)))
    this.log = options.logger ?? loggers.fetch
  }

  /**
   * Fetch a URL and return the HTML content.
   *
   * @throws the caller's abort reason when options.signal is aborted
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const headers = {
      ...DEFAULT_FETCH_HEADERS,
      ...(options.headers ?? {}),
    }

    let lastError: Error | null = null

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      try {
        const result = await this.gatedAttempt(url, headers, options, startTime)

        if (
          result.status === 'error' &&
          result.statusCode !== undefined &&
          this.retryPolicy.retryableStatusCodes.includes(result.statusCode) &&
          attempt < this.retryPolicy.maxAttempts
        ) {
          await this.backoff(url, attempt, result.error)
          continue
        }

        return result
      } catch (error) {
        options.signal?.throwIfAborted()
        lastError = error instanceof Error ? error : new Error(String(error))

        if (attempt < this.retryPolicy.maxAttempts) {
          await this.backoff(url, attempt, lastError.message)
          continue
        }
      }
    }

    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError?.message ?? 'Unknown error after retries',
    }
  }

  private async gatedAttempt(
    url: string,
    headers: Record<string, string>,
    options: FetchOptions,
    startTime: number
  ): Promise<FetchResult> {
    if (!this.gate) {
      return this.fetchOnce(url, headers, options, startTime)
    }

    await this.gate.acquire(options.signal)
    let result: FetchResult | undefined
    try {
      result = await this.fetchOnce(url, headers, options, startTime)
      return result
    } finally {
      if (options.signal?.aborted) {
        this.gate.release()
      } else {
        this.gate.record(result !== undefined && isHealthyResult(result))
      }
    }
  }

  private async backoff(url: string, attempt: number, reason: string | undefined): Promise<void> {
    const delay = Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
    this.log.debug('FETCH_RETRY', { url, attempt, delayMs: delay, reason })
    await this.sleep(delay)
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    options: FetchOptions,
    startTime: number
  ): Promise<FetchResult> {
    options.signal?.throwIfAborted()

    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    const forwardAbort = (): void => controller.abort()
    options.signal?.addEventListener('abort', forwardAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })
      const finalUrl = response.url || url

      // Blocked responses (403, 503 with captcha indicators)
      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (this.looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            finalUrl,
            durationMs: Date.now() - startTime,
            error: 'Request blocked (captcha or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          finalUrl,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          finalUrl,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await this.readBodyWithLimit(response, maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          finalUrl,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        finalUrl,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      options.signal?.throwIfAborted()

      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', forwardAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  /**
   * Heuristic check for blocked/captcha pages.
   */
  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    return BLOCK_INDICATORS.some((indicator) => lowerHtml.includes(indicator))
  }
}
