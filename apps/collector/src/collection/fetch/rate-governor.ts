/**
 * Per-Source Rate Governor
 *
 * Enforces a minimum spacing plus random jitter between requests to the
 * same source. Permits are reserved synchronously at call time, so
 * concurrent callers are served first-come-first-served and no two
 * permits for one source ever land closer than the configured interval.
 *
 * Backoff delays from the resilience engine are applied through defer(),
 * which pushes the source's next permit out without a separate sleep.
 *
 * The governor never fails; acquire() waits as long as needed unless the
 * caller's signal aborts.
 */

import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../../config/logger.js'
import { systemClock, type Clock } from '../clock.js'
import { DEFAULT_POLITENESS, type PolitenessConfig } from '../types.js'

export interface RateGovernorOptions {
  defaults?: PolitenessConfig
  /** Per-source overrides */
  overrides?: Map<string, Partial<PolitenessConfig>>
  clock?: Clock
  /** Uniform [0, 1) source for jitter */
  random?: () => number
  logger?: ILogger
}

export class RateGovernor {
  private readonly defaults: PolitenessConfig
  private readonly overrides: Map<string, Partial<PolitenessConfig>>
  private readonly clock: Clock
  private readonly random: () => number
  private readonly log: ILogger

  /** Time of the most recently reserved permit, per source */
  private readonly lastPermitAt = new Map<string, number>()
  /** Earliest time any further permit may be granted, per source */
  private readonly deferredUntil = new Map<string, number>()

  constructor(options: RateGovernorOptions = {}) {
    this.defaults = options.defaults ?? DEFAULT_POLITENESS
    this.overrides = options.overrides ?? new Map()
    this.clock = options.clock ?? systemClock
    this.random = options.random ?? Math.random
    this.log = options.logger ?? loggers.fetch.child('governor')
  }

  /**
   * Set politeness for a source. Later calls replace earlier ones.
   */
  configure(sourceId: string, config: Partial<PolitenessConfig>): void {
    this.overrides.set(sourceId, config)
  }

  getConfig(sourceId: string): PolitenessConfig {
    const override = this.overrides.get(sourceId)
    return {
      minIntervalMs: override?.minIntervalMs ?? this.defaults.minIntervalMs,
      jitter: override?.jitter ?? this.defaults.jitter,
    }
  }

  /**
   * Wait for permission to send one request to a source.
   * The first permit for a source is immediate.
   */
  async acquire(sourceId: string, signal?: AbortSignal): Promise<void> {
    const now = this.clock.now()
    const permitAt = this.reserve(sourceId, now)
    const waitMs = permitAt - now

    if (waitMs > 0) {
      this.log.debug('Waiting for permit', { sourceId, waitMs })
      await this.clock.sleep(waitMs, signal)
    }
  }

  /**
   * Hold back the source's next permit for at least delayMs from now.
   * Never shortens an existing deferral.
   */
  defer(sourceId: string, delayMs: number): void {
    if (delayMs <= 0) return
    const until = this.clock.now() + delayMs
    const current = this.deferredUntil.get(sourceId) ?? 0
    if (until > current) {
      this.deferredUntil.set(sourceId, until)
    }
  }

  /**
   * Forget all state for a source (e.g. between runs).
   */
  reset(sourceId: string): void {
    this.lastPermitAt.delete(sourceId)
    this.deferredUntil.delete(sourceId)
  }

  private reserve(sourceId: string, now: number): number {
    const config = this.getConfig(sourceId)
    const last = this.lastPermitAt.get(sourceId)

    let permitAt = last === undefined ? now : Math.max(now, last + config.minIntervalMs + this.drawJitter(config))

    const deferred = this.deferredUntil.get(sourceId)
    if (deferred !== undefined && deferred > permitAt) {
      permitAt = deferred
    }

    this.lastPermitAt.set(sourceId, permitAt)
    return permitAt
  }

  private drawJitter(config: PolitenessConfig): number {
    const { minMs, maxMs } = config.jitter
    if (maxMs <= minMs) return Math.max(0, minMs)
    return Math.floor(minMs + this.random() * (maxMs - minMs))
  }
}
