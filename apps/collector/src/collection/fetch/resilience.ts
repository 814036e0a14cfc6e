/**
 * Resilience Engine
 *
 * Runs a single network operation with pacing, retry and exponential
 * backoff:
 * - every attempt first acquires a permit from the rate governor
 * - retryable failures back off min(base * multiplier^(n-1), maxDelay),
 *   or the server's Retry-After when larger (capped)
 * - terminal failures return immediately
 * - after maxAttempts retryable failures the last error is wrapped
 *   as ExhaustedRetries
 *
 * Operations report failures as Result values. Anything they throw is
 * caught and classified, so execute() itself never rejects.
 */

import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../../config/logger.js'
import { systemClock, type Clock } from '../clock.js'
import {
  classifyError,
  CollectionError,
  ExhaustedRetriesError,
  RetryableNetworkError,
  RunCancelledError,
} from '../errors.js'
import { DEFAULT_RETRY_POLICY, fail, type FetchAttempt, type Result, type RetryPolicy } from '../types.js'
import type { RateGovernor } from './rate-governor.js'

export interface AttemptContext {
  /** 1-based */
  attempt: number
  /** Aborts on run cancellation or attempt timeout */
  signal: AbortSignal
}

export type Operation<T> = (ctx: AttemptContext) => Promise<Result<T>>

export interface ExecuteOptions {
  sourceId: string
  unitKey: string
  policy?: Partial<RetryPolicy>
  signal?: AbortSignal
  onAttempt?: (attempt: FetchAttempt) => void
}

export interface ResilienceEngineOptions {
  governor: RateGovernor
  defaultPolicy?: RetryPolicy
  clock?: Clock
  logger?: ILogger
}

/**
 * Delay before the attempt following a failed attempt n (1-based).
 */
export function computeBackoffMs(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exponential = Math.min(
    policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  )
  if (policy.honorRetryAfter && retryAfterMs !== undefined) {
    return Math.max(exponential, Math.min(retryAfterMs, policy.maxRetryAfterMs))
  }
  return exponential
}

export class ResilienceEngine {
  private readonly governor: RateGovernor
  private readonly defaultPolicy: RetryPolicy
  private readonly clock: Clock
  private readonly log: ILogger

  constructor(options: ResilienceEngineOptions) {
    this.governor = options.governor
    this.defaultPolicy = options.defaultPolicy ?? DEFAULT_RETRY_POLICY
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.fetch.child('resilience')
  }

  resolvePolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
    return { ...this.defaultPolicy, ...overrides }
  }

  async execute<T>(op: Operation<T>, options: ExecuteOptions): Promise<Result<T>> {
    const policy = this.resolvePolicy(options.policy)
    const { sourceId, unitKey, signal } = options
    const maxAttempts = Math.max(1, policy.maxAttempts)
    let lastError: CollectionError = new RetryableNetworkError('No attempt made')

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return fail(new RunCancelledError(`Cancelled before attempt ${attempt}`))
      }

      try {
        await this.governor.acquire(sourceId, signal)
      } catch (error) {
        return fail(error instanceof RunCancelledError ? error : new RunCancelledError('Cancelled', { cause: error }))
      }

      const startedAt = this.clock.now()
      const result = await this.runAttempt(op, attempt, policy.attemptTimeoutMs, signal)
      const latencyMs = this.clock.now() - startedAt

      if (result.ok) {
        this.record(options, { attempt, outcome: 'success', latencyMs })
        return result
      }

      const error = result.error
      this.record(options, {
        attempt,
        outcome: error.retryable ? 'retryable_failure' : 'terminal_failure',
        latencyMs,
        statusCode: error.statusCode,
        errorKind: error.kind,
      })

      if (!error.retryable) {
        this.log.warn('Terminal failure', { sourceId, unitKey, attempt, errorKind: error.kind, statusCode: error.statusCode }, error)
        return result
      }

      lastError = error

      if (attempt < maxAttempts) {
        const delayMs = computeBackoffMs(policy, attempt, error.retryAfterMs)
        this.governor.defer(sourceId, delayMs)
        this.log.info('Retrying after backoff', {
          sourceId,
          unitKey,
          attempt,
          delayMs,
          statusCode: error.statusCode,
          retryAfterMs: error.retryAfterMs,
        })
      }
    }

    this.log.warn('Retries exhausted', { sourceId, unitKey, attempts: maxAttempts }, lastError)
    return fail(new ExhaustedRetriesError(maxAttempts, lastError))
  }

  private async runAttempt<T>(
    op: Operation<T>,
    attempt: number,
    timeoutMs: number,
    parent?: AbortSignal
  ): Promise<Result<T>> {
    const controller = new AbortController()
    const onParentAbort = () => controller.abort()
    parent?.addEventListener('abort', onParentAbort, { once: true })

    let timer: NodeJS.Timeout | undefined
    const timedOut = new Promise<Result<T>>(resolve => {
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          controller.abort()
          resolve(fail(new RetryableNetworkError(`Attempt timed out after ${timeoutMs}ms`)))
        }, timeoutMs)
      }
    })

    try {
      const running = Promise.resolve()
        .then(() => op({ attempt, signal: controller.signal }))
        .catch((error: unknown): Result<T> => fail(classifyError(error)))
      const result = timeoutMs > 0 ? await Promise.race([running, timedOut]) : await running
      if (!result.ok && parent?.aborted && !(result.error instanceof RunCancelledError)) {
        return fail(new RunCancelledError('Cancelled during attempt', { cause: result.error }))
      }
      return result
    } finally {
      if (timer) clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    }
  }

  private record(
    options: ExecuteOptions,
    attempt: Pick<FetchAttempt, 'attempt' | 'outcome' | 'latencyMs' | 'statusCode' | 'errorKind'>
  ): void {
    options.onAttempt?.({
      sourceId: options.sourceId,
      unitKey: options.unitKey,
      at: new Date(this.clock.now()),
      ...attempt,
    })
  }
}
