/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch API for HTTP requests.
 * Supports timeout, size limits, blocked-page detection and Retry-After.
 *
 * Every method performs exactly one attempt and reports failures as
 * classified CollectionErrors; retrying is the resilience engine's job.
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../../config/logger.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import {
  classifyError,
  classifyStatus,
  ParseError,
  RETRYABLE_STATUS_CODES,
  RetryableNetworkError,
  RunCancelledError,
  TerminalRequestError,
} from '../errors.js'
import { fail, ok, type Result } from '../types.js'

export const DEFAULT_USER_AGENT = 'macro-ingest/0.1 (+research data collection)'

const DEFAULT_TIMEOUT_MS = 30000
const DEFAULT_MAX_SIZE_BYTES = 50 * 1024 * 1024

export type HttpMethod = 'GET' | 'POST' | 'HEAD'

export interface RequestOptions {
  headers?: Record<string, string>
  timeoutMs?: number
  maxSizeBytes?: number
  /** Caller cancellation (run deadline or attempt timeout) */
  signal?: AbortSignal
}

export interface HttpResponse {
  statusCode: number
  body: string
  headers: Headers
  contentHash: string
  durationMs: number
}

export interface HttpFetcherOptions {
  userAgent?: string
  timeoutMs?: number
  maxSizeBytes?: number
  retryableStatusCodes?: readonly number[]
  logger?: ILogger
  /** Clock for Retry-After dates */
  now?: () => number
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * Returns undefined when absent or unparseable; past dates yield 0.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000
  }

  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}

/**
 * HTTP client for adapters. Single attempt per call.
 */
export class HttpFetcher {
  private readonly userAgent: string
  private readonly timeoutMs: number
  private readonly maxSizeBytes: number
  private readonly retryableStatusCodes: readonly number[]
  private readonly log: ILogger
  private readonly now: () => number

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
    this.retryableStatusCodes = options.retryableStatusCodes ?? RETRYABLE_STATUS_CODES
    this.log = options.logger ?? loggers.fetch.child('http')
    this.now = options.now ?? Date.now
  }

  async getText(url: string, options?: RequestOptions): Promise<Result<string>> {
    const result = await this.request('GET', url, undefined, options)
    return result.ok ? ok(result.value.body) : result
  }

  async getJson(url: string, options?: RequestOptions): Promise<Result<unknown>> {
    const result = await this.request('GET', url, undefined, {
      ...options,
      headers: { Accept: 'application/json', ...options?.headers },
    })
    return result.ok ? this.parseJson(url, result.value.body) : result
  }

  async postJson(url: string, payload: unknown, options?: RequestOptions): Promise<Result<unknown>> {
    const result = await this.request('POST', url, JSON.stringify(payload), {
      ...options,
      headers: { Accept: 'application/json', 'Content-Type': 'application/json', ...options?.headers },
    })
    return result.ok ? this.parseJson(url, result.value.body) : result
  }

  /**
   * Status code of a HEAD request; used by health checks.
   */
  async head(url: string, options?: RequestOptions): Promise<Result<number>> {
    const result = await this.request('HEAD', url, undefined, options)
    return result.ok ? ok(result.value.statusCode) : result
  }

  async request(
    method: HttpMethod,
    url: string,
    body?: string,
    options: RequestOptions = {}
  ): Promise<Result<HttpResponse>> {
    const startTime = this.now()
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const maxSizeBytes = options.maxSizeBytes ?? this.maxSizeBytes

    if (options.signal?.aborted) {
      return fail(new RunCancelledError('Request cancelled before start'))
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    const onCallerAbort = () => controller.abort()
    options.signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      const response = await fetch(url, {
        method,
        headers: { 'User-Agent': this.userAgent, ...options.headers },
        body,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403 || response.status === 503) {
        const text = await this.readBodyWithLimit(response, maxSizeBytes)
        if (text !== null && this.looksLikeBlockedPage(text)) {
          this.log.warn('Blocked response', { ...sanitizeUrl(url), statusCode: response.status })
          return fail(
            new TerminalRequestError('Request blocked (captcha or access denied)', { statusCode: response.status })
          )
        }
        return fail(this.statusError(response))
      }

      if (!response.ok) {
        return fail(this.statusError(response))
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        return fail(
          new TerminalRequestError(`Response too large: ${contentLength} bytes`, { statusCode: response.status })
        )
      }

      const text = method === 'HEAD' ? '' : await this.readBodyWithLimit(response, maxSizeBytes)
      if (text === null) {
        return fail(new TerminalRequestError('Response exceeded size limit', { statusCode: response.status }))
      }

      return ok({
        statusCode: response.status,
        body: text,
        headers: response.headers,
        contentHash: createHash('sha256').update(text).digest('hex').slice(0, 32),
        durationMs: this.now() - startTime,
      })
    } catch (error) {
      if (options.signal?.aborted) {
        return fail(new RunCancelledError('Request cancelled', { cause: error }))
      }
      if (controller.signal.aborted) {
        return fail(new RetryableNetworkError(`Request timed out after ${timeoutMs}ms`, { cause: error }))
      }
      return fail(classifyError(error))
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  private statusError(response: Response): RetryableNetworkError | TerminalRequestError {
    const message = `HTTP ${response.status}: ${response.statusText}`
    if (classifyStatus(response.status, this.retryableStatusCodes) === 'retryable') {
      return new RetryableNetworkError(message, {
        statusCode: response.status,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after'), this.now()),
      })
    }
    return new TerminalRequestError(message, { statusCode: response.status })
  }

  private parseJson(url: string, body: string): Result<unknown> {
    try {
      const parsed: unknown = JSON.parse(body)
      return ok(parsed)
    } catch (error) {
      this.log.warn('Invalid JSON response', sanitizeUrl(url))
      return fail(new ParseError('Response body is not valid JSON', { cause: error }))
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
    const blockIndicators = [
      'captcha',
      'recaptcha',
      'hcaptcha',
      'challenge-form',
      'challenge-running',
      'cf-browser-verification',
      'please verify you are a human',
      'access denied',
      'bot detection',
    ]

    return blockIndicators.some(indicator => lowerHtml.includes(indicator))
  }
}
