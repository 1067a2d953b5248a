/**
 * Error Classification and Structured Error Handling
 *
 * Per-task failures (fetch, extraction) are reported on the skip channel and
 * never abort a run. Only the error kinds below ever propagate out of the
 * pipeline or the config loader.
 */

import { ZodError } from 'zod'

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'config' // Invalid settings, input or flags
  | 'fetch' // Network or HTTP failure after retries
  | 'extraction' // Page markup did not yield a record
  | 'unavailable' // Proxy pool quarantined past its window
  | 'timeout' // Operation timeout
  | 'internal' // Unexpected internal errors

export const ERROR_CODES = {
  // Config
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_FILE_UNREADABLE: 'CONFIG_FILE_UNREADABLE',

  // Fetch
  FETCH_FAILED: 'FETCH_FAILED',
  FETCH_PERMANENT: 'FETCH_PERMANENT',
  NETWORK_ERROR: 'NETWORK_ERROR',

  // Extraction
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',

  // Proxy pool
  PROXY_POOL_UNAVAILABLE: 'PROXY_POOL_UNAVAILABLE',

  // Timeout
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  isFatal: boolean
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

// ═══════════════════════════════════════════════════════════════════════════════
// Error Classes
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class CrawlError extends Error {
  abstract readonly category: ErrorCategory
  abstract readonly code: ErrorCode
  readonly isRetryable: boolean = false
  readonly isFatal: boolean = false
  readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.details = details
  }
}

export class FetchFailedError extends CrawlError {
  readonly category = 'fetch'
  readonly code = ERROR_CODES.FETCH_FAILED

  constructor(
    readonly url: string,
    readonly attempts: number,
    lastError?: string
  ) {
    super(`Fetch failed after ${attempts} attempts: ${url}`, { url, attempts, lastError })
  }
}

export class ExtractionFailedError extends CrawlError {
  readonly category = 'extraction'
  readonly code = ERROR_CODES.EXTRACTION_FAILED

  constructor(
    readonly url: string,
    readonly reason: string
  ) {
    super(`Extraction failed (${reason}): ${url}`, { url, reason })
  }
}

/**
 * Every proxy stayed quarantined for longer than the configured window.
 * Fatal: the pipeline stops dispatching and rejects with this error.
 */
export class ProxyPoolUnavailableError extends CrawlError {
  readonly category = 'unavailable'
  readonly code = ERROR_CODES.PROXY_POOL_UNAVAILABLE
  override readonly isFatal = true

  constructor(readonly unavailableForMs: number) {
    super(`Proxy pool unavailable for ${unavailableForMs}ms`, { unavailableForMs })
  }
}

export interface ConfigIssue {
  path: string
  message: string
}

export class ConfigError extends CrawlError {
  readonly category = 'config'
  readonly code: ErrorCode
  override readonly isFatal = true

  constructor(
    message: string,
    readonly issues: ConfigIssue[] = [],
    code: ErrorCode = ERROR_CODES.CONFIG_INVALID
  ) {
    super(
      issues.length > 0
        ? `${message}: ${issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; ')}`
        : message,
      { issues }
    )
    this.code = code
  }

  static fromZod(error: ZodError, source: string): ConfigError {
    return new ConfigError(
      `Invalid configuration in ${source}`,
      error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]

function errorCodeOf(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Classify any thrown value into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof CrawlError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isFatal: error.isFatal,
      isRetryable: error.isRetryable,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return classifyError(ConfigError.fromZod(error, 'input'))
  }

  if (error instanceof Error) {
    const code = errorCodeOf(error)

    if (code && NETWORK_ERROR_CODES.includes(code)) {
      const isTimeout = code === 'ETIMEDOUT'
      return {
        category: isTimeout ? 'timeout' : 'fetch',
        code: isTimeout ? ERROR_CODES.OPERATION_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
        message: `Network error: ${code}`,
        isFatal: false,
        isRetryable: true,
        details: { errorCode: code },
        originalError: error,
      }
    }

    if (error.name === 'AbortError' || /timeout|timed out/i.test(error.message)) {
      return {
        category: 'timeout',
        code: ERROR_CODES.OPERATION_TIMEOUT,
        message: error.message,
        isFatal: false,
        isRetryable: true,
        originalError: error,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isFatal: true,
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isFatal: true,
    isRetryable: false,
  }
}

/**
 * Flatten a classified error into log metadata
 */
export function errorLogMeta(classified: ClassifiedError): Record<string, unknown> {
  return {
    errorCategory: classified.category,
    errorCode: classified.code,
    errorMessage: classified.message,
    isFatal: classified.isFatal,
    ...(classified.details ? { errorDetails: classified.details } : {}),
  }
}
