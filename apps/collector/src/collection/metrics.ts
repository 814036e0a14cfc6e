/**
 * Collection Metrics
 *
 * Emits structured log events only; there is no metrics backend.
 */

import { loggers } from '../config/logger.js'
import type { RunMetrics, RunReport } from './types.js'

const log = loggers.orchestrator

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_UNITS_FOR_ALERT = 10

export interface RunCompletedPayload extends RunMetrics {
  runId: string
  sourceId: string
  mode: RunReport['mode']
  state: RunReport['state']
  cancelled: boolean
  durationMs: number
}

export function recordRunCompleted(payload: RunCompletedPayload): void {
  log.info('COLLECTION_RUN_COMPLETED', {
    event_name: 'COLLECTION_RUN_COMPLETED',
    ...payload,
  })

  if (payload.unitsAttempted >= MIN_UNITS_FOR_ALERT && payload.failureRate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('COLLECTION_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'COLLECTION_ALERT_HIGH_FAILURE_RATE',
      runId: payload.runId,
      sourceId: payload.sourceId,
      failureRate: payload.failureRate,
      unitsAttempted: payload.unitsAttempted,
    })
  }
}

export function recordSourceUnavailable(payload: { runId: string; sourceId: string; reason: string }): void {
  log.error('COLLECTION_SOURCE_UNAVAILABLE', {
    event_name: 'COLLECTION_SOURCE_UNAVAILABLE',
    ...payload,
  })
}

/**
 * Tally unit results into run metrics.
 */
export function summarizeResults(report: Pick<RunReport, 'results' | 'files'>, fetchAttempts: number): RunMetrics {
  const metrics: RunMetrics = {
    unitsAttempted: report.results.length,
    unitsSucceeded: 0,
    unitsFailed: 0,
    unitsSkipped: 0,
    unitsCancelled: 0,
    fetchAttempts,
    recordsNormalized: 0,
    recordsDropped: 0,
    recordsDuplicate: 0,
    recordsExported: 0,
    filesExported: report.files.length,
    failureRate: 0,
  }

  for (const result of report.results) {
    switch (result.status) {
      case 'succeeded':
        metrics.unitsSucceeded++
        metrics.recordsNormalized += result.recordsNormalized
        metrics.recordsDropped += result.recordsDropped
        metrics.recordsDuplicate += result.duplicates
        break
      case 'failed':
        metrics.unitsFailed++
        break
      case 'skipped':
        metrics.unitsSkipped++
        break
      case 'cancelled':
        metrics.unitsCancelled++
        break
    }
  }

  metrics.recordsExported = report.files.reduce((sum, file) => sum + file.records, 0)
  metrics.failureRate = metrics.unitsAttempted > 0 ? metrics.unitsFailed / metrics.unitsAttempted : 0
  return metrics
}
