/**
 * Fetching Types
 */

export interface FetchOptions {
  /** Request timeout in ms (default: 35000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** Caller cancellation; aborting rejects instead of returning a result */
  signal?: AbortSignal
}

export type FetchResultStatus = 'ok' | 'error' | 'blocked' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  html?: string
  /** URL after redirects; search pages often redirect straight to a product */
  finalUrl?: string
  error?: string
  durationMs: number
}

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

/**
 * Pacing contract every outbound request goes through: acquire() right
 * before the request, record() right after it, whatever the outcome.
 * A request the caller cancelled is handed back with release() instead.
 */
export interface RequestGate {
  acquire(signal?: AbortSignal): Promise<void>
  record(success: boolean): void
  release(): void
}

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

/**
 * Default headers for all HTTP requests.
 */
export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (compatible; refwatch/0.1; price comparison)',
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'pt-PT,pt;q=0.9,es;q=0.8,en;q=0.7',
} as const

export const DEFAULT_FETCH_TIMEOUT_MS = 35_000
export const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024 // 10 MB
