/**
 * Collection Error Taxonomy
 *
 * Every failure a unit or run can end with is one of these kinds.
 * Retryability is a property of the error, decided once at classification
 * time, so the resilience engine never re-inspects transport details.
 */

import type { RunReport } from './types.js'

export type CollectionErrorKind =
  | 'RetryableNetworkError' // Transient: timeout, reset, 429, 5xx
  | 'TerminalRequestError' // Permanent: 4xx (except 429), blocked page, invalid query
  | 'ExhaustedRetries' // Retryable errors outlived the attempt budget
  | 'CostExceeded' // Pre-flight estimate over the configured limit
  | 'ParseError' // Payload could not be read as the expected shape
  | 'TotalSourceUnavailable' // Health check failed or no unit succeeded
  | 'RunCancelled' // Deadline or caller abort
  | 'ConfigError' // Missing or invalid configuration
  | 'ExportError' // Export files could not be written

export const RETRYABLE_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504]

/**
 * Socket-level error codes treated as transient.
 */
export const RETRYABLE_NETWORK_CODES: readonly string[] = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]

export interface CollectionErrorOptions {
  cause?: unknown
  statusCode?: number
  retryAfterMs?: number
}

export class CollectionError extends Error {
  readonly kind: CollectionErrorKind
  readonly retryable: boolean
  readonly statusCode?: number
  readonly retryAfterMs?: number

  constructor(kind: CollectionErrorKind, message: string, retryable: boolean, options: CollectionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = kind
    this.kind = kind
    this.retryable = retryable
    this.statusCode = options.statusCode
    this.retryAfterMs = options.retryAfterMs
  }
}

export class RetryableNetworkError extends CollectionError {
  constructor(message: string, options?: CollectionErrorOptions) {
    super('RetryableNetworkError', message, true, options)
  }
}

export class TerminalRequestError extends CollectionError {
  constructor(message: string, options?: CollectionErrorOptions) {
    super('TerminalRequestError', message, false, options)
  }
}

export class ExhaustedRetriesError extends CollectionError {
  readonly attempts: number
  readonly lastError: CollectionError

  constructor(attempts: number, lastError: CollectionError) {
    super('ExhaustedRetries', `Gave up after ${attempts} attempts: ${lastError.message}`, false, {
      cause: lastError,
      statusCode: lastError.statusCode,
    })
    this.attempts = attempts
    this.lastError = lastError
  }
}

export class CostExceededError extends CollectionError {
  readonly estimate: number
  readonly limit: number

  constructor(estimate: number, limit: number) {
    super('CostExceeded', `Estimated cost ${estimate} exceeds limit ${limit}`, false)
    this.estimate = estimate
    this.limit = limit
  }
}

export class ParseError extends CollectionError {
  constructor(message: string, options?: CollectionErrorOptions) {
    super('ParseError', message, false, options)
  }
}

export class TotalSourceUnavailableError extends CollectionError {
  readonly sourceId: string
  /** Present when units were attempted and all of them failed */
  readonly report?: RunReport

  constructor(sourceId: string, message: string, options?: CollectionErrorOptions & { report?: RunReport }) {
    super('TotalSourceUnavailable', message, false, options)
    this.sourceId = sourceId
    this.report = options?.report
  }
}

export class RunCancelledError extends CollectionError {
  constructor(message = 'Run cancelled', options?: CollectionErrorOptions) {
    super('RunCancelled', message, false, options)
  }
}

export class ConfigError extends CollectionError {
  constructor(message: string, options?: CollectionErrorOptions) {
    super('ConfigError', message, false, options)
  }
}

export class ExportError extends CollectionError {
  constructor(message: string, options?: CollectionErrorOptions) {
    super('ExportError', message, false, options)
  }
}

export type StatusClass = 'success' | 'retryable' | 'terminal'

/**
 * Map an HTTP status code to its failure class.
 */
export function classifyStatus(
  statusCode: number,
  retryableStatusCodes: readonly number[] = RETRYABLE_STATUS_CODES
): StatusClass {
  if (statusCode >= 200 && statusCode < 300) return 'success'
  if (retryableStatusCodes.includes(statusCode)) return 'retryable'
  return 'terminal'
}

/**
 * Turn anything thrown by a network operation into a CollectionError.
 *
 * Timeouts and socket-level failures are retryable; everything that is not
 * recognised as transient is terminal.
 */
export function classifyError(error: unknown): CollectionError {
  if (error instanceof CollectionError) return error

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new RetryableNetworkError(`Request timed out: ${error.message}`, { cause: error })
    }

    const code = errorCode(error) ?? errorCode(error.cause)
    if (code && RETRYABLE_NETWORK_CODES.includes(code)) {
      return new RetryableNetworkError(`Network error ${code}: ${error.message}`, { cause: error })
    }

    if (error instanceof SyntaxError) {
      return new ParseError(error.message, { cause: error })
    }

    return new TerminalRequestError(error.message, { cause: error })
  }

  return new TerminalRequestError(String(error))
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined
  const code = value.code
  return typeof code === 'string' ? code : undefined
}
