import { describe, it, expect, vi } from 'vitest'
import { ResilienceEngine, computeBackoffMs } from '../fetch/resilience.js'
import { RateGovernor } from '../fetch/rate-governor.js'
import {
  ExhaustedRetriesError,
  RetryableNetworkError,
  RunCancelledError,
  TerminalRequestError,
} from '../errors.js'
import { DEFAULT_RETRY_POLICY, fail, ok, type FetchAttempt, type Result } from '../types.js'
import { ManualClock } from './helpers/manual-clock.js'

const POLICY = {
  ...DEFAULT_RETRY_POLICY,
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
}

function setup() {
  const clock = new ManualClock()
  const governor = new RateGovernor({
    defaults: { minIntervalMs: 0, jitter: { minMs: 0, maxMs: 0 } },
    clock,
  })
  const engine = new ResilienceEngine({ governor, defaultPolicy: POLICY, clock })
  return { clock, engine }
}

const unit = { sourceId: 'fred', unitKey: 'DFF:2024-01-01:2024-01-31' }

describe('computeBackoffMs', () => {
  const policy = { ...DEFAULT_RETRY_POLICY, baseDelayMs: 1500, backoffMultiplier: 2, maxDelayMs: 30000 }

  it('grows exponentially up to the cap', () => {
    expect([1, 2, 3, 4, 5, 6].map(n => computeBackoffMs(policy, n))).toEqual([
      1500, 3000, 6000, 12000, 24000, 30000,
    ])
  })

  it('honours a larger Retry-After, capped', () => {
    expect(computeBackoffMs(policy, 1, 5000)).toBe(5000)
    expect(computeBackoffMs(policy, 1, 500)).toBe(1500)
    expect(computeBackoffMs(policy, 1, 120000)).toBe(60000)
  })

  it('ignores Retry-After when disabled', () => {
    expect(computeBackoffMs({ ...policy, honorRetryAfter: false }, 1, 5000)).toBe(1500)
  })
})

describe('ResilienceEngine', () => {
  it('succeeds after transient failures with exponential backoff', async () => {
    const { clock, engine } = setup()
    const op = vi
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(fail(new RetryableNetworkError('HTTP 503: Service Unavailable', { statusCode: 503 })))
      .mockResolvedValueOnce(fail(new RetryableNetworkError('HTTP 502: Bad Gateway', { statusCode: 502 })))
      .mockResolvedValueOnce(ok('payload'))

    const result = await engine.execute(op, unit)

    expect(result).toEqual({ ok: true, value: 'payload' })
    expect(op).toHaveBeenCalledTimes(3)
    expect(clock.sleeps).toEqual([1000, 2000])
  })

  it('makes exactly maxAttempts attempts before giving up', async () => {
    const { clock, engine } = setup()
    const op = vi.fn(async (): Promise<Result<string>> => fail(new RetryableNetworkError('HTTP 500: Internal Server Error')))

    const result = await engine.execute(op, unit)

    expect(op).toHaveBeenCalledTimes(3)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(ExhaustedRetriesError)
    expect(result.error.kind).toBe('ExhaustedRetries')
    expect(result.error.message).toBe('Gave up after 3 attempts: HTTP 500: Internal Server Error')
    expect(clock.sleeps).toEqual([1000, 2000])
  })

  it('does not retry terminal failures', async () => {
    const { clock, engine } = setup()
    const op = vi.fn(async (): Promise<Result<string>> => fail(new TerminalRequestError('HTTP 404: Not Found', { statusCode: 404 })))

    const result = await engine.execute(op, unit)

    expect(op).toHaveBeenCalledTimes(1)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('TerminalRequestError')
    expect(result.error.statusCode).toBe(404)
    expect(clock.sleeps).toEqual([])
  })

  it('waits for a server Retry-After before the next attempt', async () => {
    const { clock, engine } = setup()
    const op = vi
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(
        fail(new RetryableNetworkError('HTTP 429: Too Many Requests', { statusCode: 429, retryAfterMs: 5000 }))
      )
      .mockResolvedValueOnce(ok('payload'))

    await engine.execute(op, unit)

    expect(clock.sleeps).toEqual([5000])
  })

  it('classifies thrown socket errors as retryable', async () => {
    const { engine } = setup()
    let calls = 0
    const result = await engine.execute(async () => {
      calls++
      if (calls === 1) {
        throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })
      }
      return ok(calls)
    }, unit)

    expect(result).toEqual({ ok: true, value: 2 })
  })

  it('classifies unknown thrown errors as terminal', async () => {
    const { engine } = setup()
    const op = vi.fn(async (): Promise<Result<string>> => {
      throw new Error('unexpected shape')
    })

    const result = await engine.execute(op, unit)

    expect(op).toHaveBeenCalledTimes(1)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('TerminalRequestError')
  })

  it('reports every attempt with its outcome', async () => {
    const { engine } = setup()
    const attempts: FetchAttempt[] = []
    await engine.execute(
      vi
        .fn<() => Promise<Result<string>>>()
        .mockResolvedValueOnce(fail(new RetryableNetworkError('HTTP 503: Service Unavailable', { statusCode: 503 })))
        .mockResolvedValueOnce(ok('payload')),
      { ...unit, onAttempt: attempt => attempts.push(attempt) }
    )

    expect(attempts.map(a => [a.attempt, a.outcome, a.statusCode])).toEqual([
      [1, 'retryable_failure', 503],
      [2, 'success', undefined],
    ])
    expect(attempts[0].errorKind).toBe('RetryableNetworkError')
  })

  it('applies per-call policy overrides', async () => {
    const { engine } = setup()
    const op = vi.fn(async (): Promise<Result<string>> => fail(new RetryableNetworkError('HTTP 503: Service Unavailable')))

    await engine.execute(op, { ...unit, policy: { maxAttempts: 5 } })

    expect(op).toHaveBeenCalledTimes(5)
  })

  it('returns RunCancelled without calling the operation when already aborted', async () => {
    const { engine } = setup()
    const controller = new AbortController()
    controller.abort()
    const op = vi.fn(async (): Promise<Result<string>> => ok('never'))

    const result = await engine.execute(op, { ...unit, signal: controller.signal })

    expect(op).not.toHaveBeenCalled()
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(RunCancelledError)
  })

  it('times out a hung attempt as retryable', async () => {
    const { engine } = setup()
    const result = await engine.execute(() => new Promise<Result<string>>(() => undefined), {
      ...unit,
      policy: { maxAttempts: 1, attemptTimeoutMs: 20 },
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(ExhaustedRetriesError)
    expect(result.error.message).toBe('Gave up after 1 attempts: Attempt timed out after 20ms')
  })
})
