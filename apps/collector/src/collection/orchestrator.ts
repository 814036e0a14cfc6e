/**
 * Collection Orchestrator
 *
 * Drives one run of one source adapter:
 *
 *   health check -> enumerate units -> per unit:
 *     fetch (resilience engine) -> normalize -> dedupe -> export
 *   -> advance watermarks -> report
 *
 * Units are pulled lazily from the adapter and processed by a bounded pool
 * of workers (manifest.maxConcurrency, default 1). Fetches overlap, but
 * dedupe runs in enumeration order, so the first unit discovered keeps a
 * shared fingerprint. Units of one run append to one file per dataset and
 * date through an export session. A failed unit is
 * recorded in the run manifest and the run continues. The run only fails
 * when the health check fails, enumeration fails before yielding anything,
 * or no unit succeeds.
 */

import { createId } from '@paralleldrive/cuid2'
import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../config/logger.js'
import { createRunLogger } from '../config/structured-log.js'
import { systemClock, type Clock } from './clock.js'
import {
  classifyError,
  CollectionError,
  ExportError,
  ParseError,
  RunCancelledError,
  TotalSourceUnavailableError,
} from './errors.js'
import type { HttpFetcher } from './fetch/http-fetcher.js'
import type { AttemptContext, ResilienceEngine } from './fetch/resilience.js'
import type { RateGovernor } from './fetch/rate-governor.js'
import { Lifecycle } from './lifecycle.js'
import { recordRunCompleted, recordSourceUnavailable, summarizeResults } from './metrics.js'
import type { CostGuard } from './process/cost-guard.js'
import { Deduplicator } from './process/dedupe.js'
import type { ExportBatch, ExportSession, ExportSink } from './process/export-sink.js'
import { writeRunManifest } from './process/run-manifest.js'
import { maxCursor, type WatermarkTracker } from './process/watermark.js'
import type {
  AdapterContext,
  AnySourceAdapter,
  CollectionResult,
  CollectionUnit,
  Cursor,
  EnumerationContext,
  ExportedFile,
  FetchAttempt,
  FetchContext,
  ManifestEntry,
  NormalizedRecord,
  NormalizeOutcome,
  Result,
  RunReport,
  RunRequest,
  WatermarkAdvance,
  WatermarkPolicy,
  WatermarkReader,
} from './types.js'
import { toIsoDate } from './utils/dates.js'
import { Mutex } from './utils/mutex.js'
import { SequenceGate } from './utils/sequence-gate.js'

export interface OrchestratorOptions {
  governor: RateGovernor
  engine: ResilienceEngine
  http: HttpFetcher
  costGuard: CostGuard
  sink: ExportSink
  watermarks: WatermarkTracker
  /** Where run manifests are written; omitted means report-only */
  manifestDir?: string
  /** Builds the seen set for a source; defaults to reading the sink's exports */
  loadDeduplicator?: (sourceId: string) => Promise<Deduplicator>
  clock?: Clock
  logger?: ILogger
  createRunId?: () => string
}

interface PulledUnit {
  unit: CollectionUnit
  order: number
  /** False when the unit's own fingerprint was already seen or claimed */
  claimed: boolean
}

interface RunScope {
  adapter: AnySourceAdapter
  log: ILogger
  baseContext: AdapterContext
  dedupe: Deduplicator
  session: ExportSession
  dedupeOrder: SequenceGate
  signal: AbortSignal
  fetchContext: (attempt: AttemptContext) => FetchContext
  onAttempt: (attempt: FetchAttempt) => void
}

/**
 * Cursor each dataset's watermark should move to, given the run's results.
 *
 * - max: greatest cursor of any successful unit
 * - contiguous: greatest cursor reached before the first failed or
 *   cancelled unit, in enumeration order
 */
export function computeWatermarkTargets(
  results: readonly CollectionResult[],
  policy: WatermarkPolicy
): Map<string, Cursor> {
  const byDataset = new Map<string, CollectionResult[]>()
  for (const result of results) {
    const group = byDataset.get(result.dataset) ?? []
    group.push(result)
    byDataset.set(result.dataset, group)
  }

  const targets = new Map<string, Cursor>()
  for (const [dataset, group] of byDataset) {
    const ordered = [...group].sort((a, b) => a.order - b.order)
    let target: Cursor | undefined

    for (const result of ordered) {
      if (result.status === 'succeeded') {
        target = maxCursor(target, result.cursor)
        continue
      }
      if (result.status === 'skipped') continue
      if (policy === 'contiguous') break
    }

    if (target !== undefined) targets.set(dataset, target)
  }
  return targets
}

export class CollectionOrchestrator {
  private readonly governor: RateGovernor
  private readonly engine: ResilienceEngine
  private readonly http: HttpFetcher
  private readonly costGuard: CostGuard
  private readonly sink: ExportSink
  private readonly watermarks: WatermarkTracker
  private readonly manifestDir?: string
  private readonly loadDeduplicator: (sourceId: string) => Promise<Deduplicator>
  private readonly clock: Clock
  private readonly log: ILogger
  private readonly createRunId: () => string

  constructor(options: OrchestratorOptions) {
    this.governor = options.governor
    this.engine = options.engine
    this.http = options.http
    this.costGuard = options.costGuard
    this.sink = options.sink
    this.watermarks = options.watermarks
    this.manifestDir = options.manifestDir
    this.loadDeduplicator =
      options.loadDeduplicator ?? (sourceId => Deduplicator.load(sourceId, options.sink))
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.orchestrator
    this.createRunId = options.createRunId ?? createId
  }

  /**
   * Run one collection pass for a source.
   *
   * @throws TotalSourceUnavailableError when the source cannot be collected at all
   */
  async run(adapter: AnySourceAdapter, request: RunRequest): Promise<RunReport> {
    const controller = new AbortController()
    const deadlineMs = request.deadlineMs ?? 0
    const deadline =
      deadlineMs > 0
        ? setTimeout(() => controller.abort(new RunCancelledError(`Run deadline of ${deadlineMs}ms reached`)), deadlineMs)
        : undefined

    try {
      return await this.execute(adapter, request, controller.signal)
    } finally {
      if (deadline) clearTimeout(deadline)
    }
  }

  private async execute(adapter: AnySourceAdapter, request: RunRequest, signal: AbortSignal): Promise<RunReport> {
    const manifest = adapter.manifest
    const sourceId = manifest.id
    const runId = this.createRunId()
    const startedAt = new Date(this.clock.now())
    const log = createRunLogger(this.log, { runId, sourceId })
    const runLifecycle = new Lifecycle(log)

    const baseContext: AdapterContext = {
      sourceId,
      runId,
      collectedAt: startedAt,
      logger: createRunLogger(loggers.adapters.child(sourceId), { runId, sourceId }),
    }

    if (manifest.politeness) {
      this.governor.configure(sourceId, manifest.politeness)
    }

    log.info('COLLECTION_RUN_STARTED', {
      mode: request.mode,
      rangeStart: toIsoDate(request.range.start),
      rangeEnd: toIsoDate(request.range.end),
    })

    if (!(await this.checkHealth(adapter, baseContext, signal, log))) {
      recordSourceUnavailable({ runId, sourceId, reason: 'health_check_failed' })
      throw new TotalSourceUnavailableError(sourceId, `Health check failed for source '${sourceId}'`)
    }

    const dedupe = await this.loadDeduplicator(sourceId)
    if (!this.watermarks.isLoaded) {
      await this.watermarks.load()
    }

    const incremental = request.mode === 'incremental' && manifest.supportsIncremental
    const fullRefresh = new Set(manifest.fullRefreshDatasets ?? [])
    const reader: WatermarkReader = {
      get: dataset => (incremental && !fullRefresh.has(dataset) ? this.watermarks.get(sourceId, dataset) : undefined),
    }

    let fetchAttempts = 0
    const onAttempt = (attempt: FetchAttempt) => {
      fetchAttempts++
      log.debug('FETCH_ATTEMPT', { ...attempt })
    }

    const fetchContext = (attempt: AttemptContext): FetchContext => ({
      ...baseContext,
      http: this.http,
      costGuard: this.costGuard,
      signal: attempt.signal,
      attempt: attempt.attempt,
    })

    const enumerationContext: EnumerationContext = {
      ...baseContext,
      range: request.range,
      incremental,
      watermarks: reader,
      signal,
      discover: <T>(key: string, op: (ctx: FetchContext) => Promise<Result<T>>): Promise<Result<T>> =>
        this.engine.execute<T>(attempt => op(fetchContext(attempt)), {
          sourceId,
          unitKey: `discover:${key}`,
          policy: manifest.retryPolicy,
          signal,
          onAttempt,
        }),
    }

    runLifecycle.to('Enumerating')
    const scope: RunScope = {
      adapter,
      log,
      baseContext,
      dedupe,
      session: this.sink.openSession(),
      dedupeOrder: new SequenceGate(),
      signal,
      fetchContext,
      onAttempt,
    }
    const { results, files, enumerationError } = await this.processUnits(scope, enumerationContext)

    if (enumerationError && results.length === 0 && !(enumerationError instanceof RunCancelledError)) {
      runLifecycle.to('Failed')
      recordSourceUnavailable({ runId, sourceId, reason: 'enumeration_failed' })
      throw new TotalSourceUnavailableError(sourceId, `Enumeration failed: ${enumerationError.message}`, {
        cause: enumerationError,
      })
    }

    const watermarks = manifest.supportsIncremental
      ? await this.advanceWatermarks(sourceId, results, manifest.watermarkPolicy, fullRefresh)
      : []

    const succeeded = results.filter(r => r.status === 'succeeded' || r.status === 'skipped').length
    const failed = results.filter(r => r.status === 'failed').length
    const totalFailure = failed > 0 && succeeded === 0
    runLifecycle.to(totalFailure ? 'Failed' : 'Idle')

    const manifestEntries = buildManifest(results)
    if (enumerationError) {
      manifestEntries.push({
        unitKey: 'enumeration',
        dataset: '*',
        status: enumerationError instanceof RunCancelledError ? 'cancelled' : 'failed',
        errorKind: enumerationError.kind,
        message: enumerationError.message,
        attempts: 0,
      })
    }

    const finishedAt = new Date(this.clock.now())
    const report: RunReport = {
      runId,
      sourceId,
      mode: request.mode,
      range: request.range,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      state: totalFailure ? 'Failed' : 'Idle',
      cancelled: signal.aborted,
      results,
      files,
      manifest: manifestEntries,
      watermarks,
      metrics: summarizeResults({ results, files }, fetchAttempts),
    }

    if (this.manifestDir) {
      const path = await writeRunManifest(this.manifestDir, report)
      if (path) log.info('Run manifest written', { path, entries: report.manifest.length })
    }

    recordRunCompleted({
      runId,
      sourceId,
      mode: report.mode,
      state: report.state,
      cancelled: report.cancelled,
      durationMs: report.durationMs,
      ...report.metrics,
    })

    if (totalFailure) {
      recordSourceUnavailable({ runId, sourceId, reason: 'no_unit_succeeded' })
      throw new TotalSourceUnavailableError(sourceId, `No unit succeeded for source '${sourceId}' (${failed} failed)`, {
        report,
      })
    }

    return report
  }

  private async checkHealth(
    adapter: AnySourceAdapter,
    context: AdapterContext,
    signal: AbortSignal,
    log: ILogger
  ): Promise<boolean> {
    try {
      await this.governor.acquire(context.sourceId, signal)
      const healthy = await adapter.healthCheck({ ...context, http: this.http, signal })
      log.info('HEALTH_CHECK', { healthy })
      return healthy
    } catch (error) {
      log.warn('HEALTH_CHECK', { healthy: false }, error)
      return false
    }
  }

  private async processUnits(
    scope: RunScope,
    enumerationContext: EnumerationContext
  ): Promise<{ results: CollectionResult[]; files: ExportedFile[]; enumerationError?: CollectionError }> {
    const iterator = scope.adapter.enumerateUnits(enumerationContext)[Symbol.asyncIterator]()
    const pullLock = new Mutex()
    const seenKeys = new Set<string>()
    const results: CollectionResult[] = []
    let order = 0
    let exhausted = false
    let enumerationError: CollectionError | undefined

    const pull = (): Promise<PulledUnit | null> =>
      pullLock.runExclusive(async () => {
        while (!exhausted && !scope.signal.aborted) {
          let step: IteratorResult<CollectionUnit>
          try {
            step = await iterator.next()
          } catch (error) {
            exhausted = true
            enumerationError = scope.signal.aborted
              ? new RunCancelledError('Cancelled during enumeration', { cause: error })
              : classifyError(error)
            scope.log.error('ENUMERATION_FAILED', { errorKind: enumerationError.kind }, enumerationError)
            return null
          }

          if (step.done) {
            exhausted = true
            return null
          }

          if (seenKeys.has(step.value.key)) {
            scope.log.warn('Duplicate unit key skipped', { unitKey: step.value.key })
            continue
          }
          seenKeys.add(step.value.key)
          const unit = step.value
          const claimed = !unit.fingerprint || scope.dedupe.claim(unit.fingerprint, unit.key)
          return { unit, order: order++, claimed }
        }
        return null
      })

    const worker = async (lane: number): Promise<void> => {
      const lifecycle = new Lifecycle(scope.log.child({ lane }))
      lifecycle.to('Enumerating')
      for (;;) {
        const pulled = await pull()
        if (!pulled) break
        try {
          results.push(await this.processUnit(scope, pulled, lifecycle))
        } finally {
          scope.dedupeOrder.pass(pulled.order)
        }
        lifecycle.to('Enumerating')
      }
      lifecycle.to('Idle')
    }

    const concurrency = Math.max(1, scope.adapter.manifest.maxConcurrency ?? 1)
    await Promise.all(Array.from({ length: concurrency }, (_, lane) => worker(lane)))

    if (!exhausted) {
      await iterator.return?.()
      if (scope.signal.aborted && !enumerationError) {
        enumerationError = new RunCancelledError('Run cancelled before enumeration finished')
      }
    }

    results.sort((a, b) => a.order - b.order)
    return { results, files: scope.session.exportedFiles(), enumerationError }
  }

  private async processUnit(
    scope: RunScope,
    pulled: PulledUnit,
    lifecycle: Lifecycle
  ): Promise<CollectionResult> {
    const { unit, order } = pulled
    const { adapter, dedupe, signal } = scope
    const log = scope.log.child({ unitKey: unit.key, dataset: unit.dataset })
    const base = { unitKey: unit.key, dataset: unit.dataset, order }
    let attempts = 0

    if (!pulled.claimed) {
      log.debug('UNIT_SKIPPED', { reason: 'ALREADY_SEEN' })
      return { ...base, status: 'skipped', reason: 'ALREADY_SEEN' }
    }
    const unitClaims = unit.fingerprint ? [unit.fingerprint] : []

    const failed = (error: CollectionError): CollectionResult => {
      dedupe.release(unitClaims)
      if (error instanceof RunCancelledError) {
        log.warn('UNIT_CANCELLED', { attempts })
        return { ...base, status: 'cancelled', attempts }
      }
      log.warn('UNIT_FAILED', { attempts, errorKind: error.kind, statusCode: error.statusCode }, error)
      return {
        ...base,
        status: 'failed',
        attempts,
        errorKind: error.kind,
        message: error.message,
        statusCode: error.statusCode,
      }
    }

    try {
      lifecycle.to('FetchingUnit')
      const fetched = await this.engine.execute(attempt => adapter.fetch(unit, scope.fetchContext(attempt)), {
        sourceId: unit.sourceId,
        unitKey: unit.key,
        policy: adapter.manifest.retryPolicy,
        signal,
        onAttempt: attempt => {
          attempts = attempt.attempt
          scope.onAttempt(attempt)
        },
      })
      if (!fetched.ok) return failed(fetched.error)

      lifecycle.to('Normalizing')
      let outcome: NormalizeOutcome
      try {
        outcome = adapter.normalize(fetched.value, unit, scope.baseContext)
      } catch (error) {
        return failed(
          error instanceof CollectionError
            ? error
            : new ParseError(error instanceof Error ? error.message : String(error), { cause: error })
        )
      }
      for (const dropped of outcome.dropped) {
        log.warn('ROW_DROPPED', { reason: dropped.reason, detail: dropped.detail })
      }

      lifecycle.to('Deduplicating')
      await scope.dedupeOrder.wait(order)
      const deduped = dedupe.filter(outcome.records, unit.key)
      scope.dedupeOrder.pass(order)
      const claims = [...unitClaims, ...deduped.claimed]

      if (signal.aborted) {
        dedupe.release(claims)
        return failed(new RunCancelledError('Cancelled before export'))
      }

      lifecycle.to('Exporting')
      let files: ExportedFile[]
      try {
        files = await scope.session.writeUnit(
          toBatches(unit, deduped.kept, adapter.manifest.exportFormat, scope.baseContext)
        )
      } catch (error) {
        dedupe.release(claims)
        return failed(error instanceof CollectionError ? error : new ExportError('Export failed', { cause: error }))
      }
      dedupe.commit(claims)

      const cursor = adapter.watermarkCursor
        ? adapter.watermarkCursor(unit, outcome.records)
        : unit.range
          ? toIsoDate(unit.range.end)
          : undefined

      log.info('UNIT_COLLECTED', {
        attempts,
        records: outcome.records.length,
        dropped: outcome.dropped.length,
        duplicates: deduped.duplicates.length,
        files: files.length,
        cursor,
      })

      return {
        ...base,
        status: 'succeeded',
        attempts,
        recordsNormalized: outcome.records.length,
        recordsDropped: outcome.dropped.length,
        duplicates: deduped.duplicates.length,
        files,
        cursor,
      }
    } catch (error) {
      return failed(classifyError(error))
    }
  }

  private async advanceWatermarks(
    sourceId: string,
    results: readonly CollectionResult[],
    policy: WatermarkPolicy,
    fullRefresh: ReadonlySet<string>
  ): Promise<WatermarkAdvance[]> {
    const advances: WatermarkAdvance[] = []
    const targets = [...computeWatermarkTargets(results, policy)].sort(([a], [b]) => a.localeCompare(b))

    for (const [dataset, cursor] of targets) {
      if (fullRefresh.has(dataset)) continue
      const previous = this.watermarks.get(sourceId, dataset)
      if (this.watermarks.advance(sourceId, dataset, cursor)) {
        advances.push({ dataset, previous, next: cursor })
      }
    }

    if (advances.length > 0) {
      await this.watermarks.flush()
    }
    return advances
  }
}

function buildManifest(results: readonly CollectionResult[]): ManifestEntry[] {
  const entries: ManifestEntry[] = []
  for (const result of results) {
    switch (result.status) {
      case 'failed':
        entries.push({
          unitKey: result.unitKey,
          dataset: result.dataset,
          status: 'failed',
          errorKind: result.errorKind,
          message: result.message,
          attempts: result.attempts,
        })
        break
      case 'cancelled':
        entries.push({
          unitKey: result.unitKey,
          dataset: result.dataset,
          status: 'cancelled',
          errorKind: 'RunCancelled',
          message: 'Run cancelled before the unit completed',
          attempts: result.attempts,
        })
        break
      case 'skipped':
      case 'succeeded':
        break
    }
  }
  return entries
}

function toBatches(
  unit: CollectionUnit,
  records: readonly NormalizedRecord[],
  format: ExportBatch['format'],
  context: AdapterContext
): ExportBatch[] {
  const byDataset = new Map<string, NormalizedRecord[]>()
  for (const record of records) {
    const group = byDataset.get(record.dataset) ?? []
    group.push(record)
    byDataset.set(record.dataset, group)
  }

  return [...byDataset].map(([dataset, group]) => ({
    sourceId: unit.sourceId,
    dataset,
    format,
    exportDate: unit.exportDate ?? context.collectedAt,
    records: group.map(record =>
      record.fingerprint ? { ...record.fields, fingerprint: record.fingerprint } : record.fields
    ),
  }))
}
