/**
 * Error Taxonomy and Classification
 *
 * Every failure inside the engine maps to a category with a fixed
 * operational response. None of them is fatal to a multi-store run:
 * the worst outcome is a forced re-fetch or a conservative NO_MATCH.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'input' // Unusable raw reference (skip the product)
  | 'signal' // Scraper returned incomplete page signals (score with blanks)
  | 'storage' // Cache read/write failure (treat as cache miss)
  | 'throttle' // Rate limiter contract broken (log only)
  | 'config' // Invalid configuration or store definition
  | 'network' // Fetch failed: DNS, reset, timeout
  | 'cancelled' // Caller aborted the operation
  | 'internal' // Anything unexpected

export const ERROR_CODES = {
  UNSEARCHABLE_REFERENCE: 'UNSEARCHABLE_REFERENCE',
  INVALID_FEED: 'INVALID_FEED',
  INVALID_STORE_DEFINITION: 'INVALID_STORE_DEFINITION',
  INCOMPLETE_SIGNALS: 'INCOMPLETE_SIGNALS',
  STORE_FETCH_FAILED: 'STORE_FETCH_FAILED',
  CACHE_READ_FAILED: 'CACHE_READ_FAILED',
  CACHE_WRITE_FAILED: 'CACHE_WRITE_FAILED',
  ACQUIRE_BYPASSED: 'ACQUIRE_BYPASSED',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  NETWORK_ERROR: 'NETWORK_ERROR',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  OPERATION_ABORTED: 'OPERATION_ABORTED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  isOperational: boolean // Expected failure vs bug
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

// ═══════════════════════════════════════════════════════════════════════════════
// Engine errors
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class MatcherError extends Error {
  abstract readonly category: ErrorCategory
  abstract readonly code: ErrorCode
  readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.details = details
  }
}

/** Raw reference normalizes to nothing searchable */
export class InputError extends MatcherError {
  readonly category = 'input'
  readonly code = ERROR_CODES.UNSEARCHABLE_REFERENCE
}

/** Feed file missing or not well-formed XML */
export class FeedError extends MatcherError {
  readonly category = 'input'
  readonly code = ERROR_CODES.INVALID_FEED
}

/** Store definitions file missing or failing validation */
export class StoreDefinitionError extends MatcherError {
  readonly category = 'config'
  readonly code = ERROR_CODES.INVALID_STORE_DEFINITION
}

/** Page signals arrived with expected fields missing */
export class SignalError extends MatcherError {
  readonly category = 'signal'
  readonly code = ERROR_CODES.INCOMPLETE_SIGNALS
}

/** A store page could not be fetched (blocked, timed out, server error) */
export class StoreFetchError extends MatcherError {
  readonly category = 'network'
  readonly code = ERROR_CODES.STORE_FETCH_FAILED
}

export class StorageError extends MatcherError {
  readonly category = 'storage'
  readonly code: ErrorCode

  constructor(
    operation: 'read' | 'write',
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, details, options)
    this.code = operation === 'read' ? ERROR_CODES.CACHE_READ_FAILED : ERROR_CODES.CACHE_WRITE_FAILED
  }
}

/** record() observed without a preceding acquire() */
export class ThrottleViolation extends MatcherError {
  readonly category = 'throttle'
  readonly code = ERROR_CODES.ACQUIRE_BYPASSED
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
])

const RETRYABLE_CATEGORIES: ReadonlySet<ErrorCategory> = new Set(['storage', 'network'])

function errorCodeOf(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code
  if (error.cause instanceof Error) return errorCodeOf(error.cause)
  return undefined
}

/**
 * Classify anything thrown into a structured, loggable shape.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof MatcherError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isOperational: true,
      isRetryable: RETRYABLE_CATEGORIES.has(error.category),
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'config',
      code: ERROR_CODES.INVALID_CONFIGURATION,
      message: 'Invalid configuration',
      isOperational: true,
      isRetryable: false,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return {
        category: 'cancelled',
        code: ERROR_CODES.OPERATION_ABORTED,
        message: error.message,
        isOperational: true,
        isRetryable: false,
        originalError: error,
      }
    }

    const code = errorCodeOf(error)
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return {
        category: 'network',
        code: code === 'ETIMEDOUT' ? ERROR_CODES.OPERATION_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
        message: `Network error: ${code}`,
        isOperational: true,
        isRetryable: true,
        details: { errorCode: code },
        originalError: error,
      }
    }

    const lower = error.message.toLowerCase()
    if (error.name === 'TimeoutError' || lower.includes('timed out') || lower.includes('timeout')) {
      return {
        category: 'network',
        code: ERROR_CODES.OPERATION_TIMEOUT,
        message: error.message,
        isOperational: true,
        isRetryable: true,
        originalError: error,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isOperational: false,
    isRetryable: false,
  }
}

/**
 * Flatten a classified error into log metadata.
 */
export function errorLogMeta(error: unknown): Record<string, unknown> {
  const classified = classifyError(error)
  return {
    errorCategory: classified.category,
    errorCode: classified.code,
    errorMessage: classified.message,
    retryable: classified.isRetryable,
    ...(classified.details ? { errorDetails: classified.details } : {}),
  }
}
