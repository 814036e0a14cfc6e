/**
 * Cost Guard
 *
 * Pre-flight check for metered operations (e.g. bytes scanned by a
 * warehouse query). The guarded operation only runs when the estimate is
 * within the limit.
 */

import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../../config/logger.js'
import { CostExceededError, TerminalRequestError, type CollectionError } from '../errors.js'
import { fail, ok, type Result } from '../types.js'

export interface CostGuardOptions {
  /** Default limit when a call does not pass one */
  limit: number
  logger?: ILogger
}

export class CostGuard {
  readonly limit: number
  private readonly log: ILogger

  constructor(options: CostGuardOptions) {
    this.limit = options.limit
    this.log = options.logger ?? loggers.fetch.child('cost')
  }

  /**
   * Fails iff estimate > limit.
   */
  guard(estimate: number, limit: number = this.limit): Result<void, CostExceededError> {
    if (estimate > limit) {
      return fail(new CostExceededError(estimate, limit))
    }
    return ok(undefined)
  }

  /**
   * Estimate first, then run op only when the estimate passes.
   * A failed or non-numeric estimate also prevents op from running.
   */
  async guarded<T>(
    estimate: () => Promise<Result<number>>,
    op: () => Promise<Result<T>>,
    limit: number = this.limit
  ): Promise<Result<T, CollectionError>> {
    const estimated = await estimate()
    if (!estimated.ok) return estimated

    if (!Number.isFinite(estimated.value) || estimated.value < 0) {
      return fail(new TerminalRequestError(`Invalid cost estimate: ${estimated.value}`))
    }

    const verdict = this.guard(estimated.value, limit)
    if (!verdict.ok) {
      this.log.warn('COST_LIMIT_EXCEEDED', {
        event_name: 'COST_LIMIT_EXCEEDED',
        estimate: estimated.value,
        limit,
      })
      return verdict
    }

    this.log.debug('Cost estimate within limit', { estimate: estimated.value, limit })
    return op()
  }
}
