import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { CollectionOrchestrator, computeWatermarkTargets } from '../orchestrator.js'
import { RateGovernor } from '../fetch/rate-governor.js'
import { ResilienceEngine } from '../fetch/resilience.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { CostGuard } from '../process/cost-guard.js'
import { ExportSink } from '../process/export-sink.js'
import { Deduplicator } from '../process/dedupe.js'
import { WatermarkTracker } from '../process/watermark.js'
import {
  ParseError,
  RetryableNetworkError,
  RunCancelledError,
  TerminalRequestError,
  TotalSourceUnavailableError,
} from '../errors.js'
import {
  DEFAULT_RETRY_POLICY,
  fail,
  ok,
  type AdapterManifest,
  type CollectionResult,
  type CollectionUnit,
  type Cursor,
  type FetchContext,
  type NormalizedRecord,
  type Result,
  type RunReport,
  type SourceAdapter,
} from '../types.js'
import { eachDay, parseIsoDate, resumeFrom, toIsoDate } from '../utils/dates.js'
import { ManualClock } from './helpers/manual-clock.js'
import { MemoryWatermarkStore } from './helpers/memory-watermark-store.js'

interface DayMeta {
  day: string
}

interface FakeAdapterOptions {
  days: string[]
  manifest?: Partial<AdapterManifest>
  healthy?: boolean
  /** Overrides the default fetch, which returns the unit's day */
  fetch?: (unit: CollectionUnit<DayMeta>, ctx: FetchContext) => Promise<Result<string>>
  /** Fingerprints of the records a day yields; defaults to none */
  fingerprints?: (day: string) => string[]
  /** Day whose file a unit's records go to; defaults to the unit's own day */
  exportDay?: (day: string) => string
  /** Fingerprint on the unit itself, known before fetch */
  unitFingerprint?: (day: string) => string | undefined
  /** Throw from enumeration after yielding this many units */
  enumerationFailsAfter?: number
  onWatermark?: (cursor: Cursor | undefined) => void
}

function day(iso: string): Date {
  const parsed = parseIsoDate(iso)
  if (!parsed) throw new Error(`bad test date ${iso}`)
  return parsed
}

function days(start: string, end: string): string[] {
  return eachDay(day(start), day(end)).map(toIsoDate)
}

function fakeAdapter(options: FakeAdapterOptions): SourceAdapter<string, DayMeta> & { fetchCalls: string[] } {
  const fetchCalls: string[] = []
  return {
    fetchCalls,
    manifest: {
      id: 'fake',
      name: 'Fake Source',
      version: '1.0.0',
      exportFormat: 'jsonl',
      baseUrls: ['https://example.com'],
      supportsIncremental: true,
      watermarkPolicy: 'contiguous',
      defaultLookbackDays: 30,
      politeness: { minIntervalMs: 0, jitter: { minMs: 0, maxMs: 0 } },
      ...options.manifest,
    },

    async *enumerateUnits(ctx) {
      const watermark = ctx.watermarks.get('rates')
      options.onWatermark?.(watermark)
      const from = toIsoDate(ctx.incremental ? resumeFrom(ctx.range.start, watermark) : ctx.range.start)

      let yielded = 0
      for (const iso of options.days) {
        if (iso < from) continue
        if (options.enumerationFailsAfter !== undefined && yielded === options.enumerationFailsAfter) {
          throw new TerminalRequestError('HTTP 403: Forbidden', { statusCode: 403 })
        }
        yielded++
        yield {
          sourceId: 'fake',
          key: `rates:${iso}`,
          dataset: 'rates',
          range: { start: day(iso), end: day(iso) },
          exportDate: day(options.exportDay?.(iso) ?? iso),
          fingerprint: options.unitFingerprint?.(iso),
          meta: { day: iso },
        }
      }
    },

    async fetch(unit, ctx) {
      fetchCalls.push(unit.meta.day)
      return options.fetch ? options.fetch(unit, ctx) : ok(unit.meta.day)
    },

    normalize(payload, unit, ctx) {
      const fingerprints = options.fingerprints?.(payload) ?? []
      const records: NormalizedRecord[] = (fingerprints.length > 0 ? fingerprints : [undefined]).map(
        fingerprint => ({
          dataset: unit.dataset,
          fingerprint,
          fields: {
            source: 'fake',
            timestamp_collected: ctx.collectedAt.toISOString(),
            date: payload,
            value: 1,
          },
        })
      )
      return { records, dropped: [] }
    },

    async healthCheck() {
      return options.healthy ?? true
    },
  }
}

describe('computeWatermarkTargets', () => {
  const succeeded = (order: number, cursor: string, dataset = 'rates'): CollectionResult => ({
    unitKey: `u${order}`,
    dataset,
    order,
    status: 'succeeded',
    attempts: 1,
    recordsNormalized: 1,
    recordsDropped: 0,
    duplicates: 0,
    files: [],
    cursor,
  })
  const failed = (order: number, dataset = 'rates'): CollectionResult => ({
    unitKey: `u${order}`,
    dataset,
    order,
    status: 'failed',
    attempts: 1,
    errorKind: 'TerminalRequestError',
    message: 'HTTP 404: Not Found',
  })

  it('stops a contiguous watermark at the first failure in enumeration order', () => {
    const results = [succeeded(2, '2024-01-03'), failed(1), succeeded(0, '2024-01-01')]
    expect(computeWatermarkTargets(results, 'contiguous')).toEqual(new Map([['rates', '2024-01-01']]))
  })

  it('takes the highest successful cursor under the max policy', () => {
    const results = [succeeded(0, '2024-01-01'), failed(1), succeeded(2, '2024-01-03')]
    expect(computeWatermarkTargets(results, 'max')).toEqual(new Map([['rates', '2024-01-03']]))
  })

  it('tracks datasets separately', () => {
    const results = [failed(0, 'DFF'), succeeded(1, '2024-01-02', 'DFF'), succeeded(2, '2024-01-05', 'DGS10')]
    expect(computeWatermarkTargets(results, 'contiguous')).toEqual(new Map([['DGS10', '2024-01-05']]))
  })

  it('does not let skipped units break contiguity', () => {
    const results: CollectionResult[] = [
      succeeded(0, '2024-01-01'),
      { unitKey: 'u1', dataset: 'rates', order: 1, status: 'skipped', reason: 'ALREADY_SEEN' },
      succeeded(2, '2024-01-03'),
    ]
    expect(computeWatermarkTargets(results, 'contiguous')).toEqual(new Map([['rates', '2024-01-03']]))
  })
})

describe('CollectionOrchestrator', () => {
  let root: string
  let rawDir: string
  let manifestDir: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'orchestrator-'))
    rawDir = join(root, 'raw')
    manifestDir = join(root, 'manifests')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  function setup(options: { seen?: string[]; watermarks?: Record<string, Cursor>; reloadFromExports?: boolean } = {}) {
    const clock = new ManualClock(Date.UTC(2024, 1, 1, 6))
    const governor = new RateGovernor({ defaults: { minIntervalMs: 0, jitter: { minMs: 0, maxMs: 0 } }, clock })
    const engine = new ResilienceEngine({
      governor,
      defaultPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: 3, baseDelayMs: 100 },
      clock,
    })
    const store = new MemoryWatermarkStore(options.watermarks)
    const tracker = new WatermarkTracker(store)
    const orchestrator = new CollectionOrchestrator({
      governor,
      engine,
      http: new HttpFetcher(),
      costGuard: new CostGuard({ limit: 1000 }),
      sink: new ExportSink({ rawDir }),
      watermarks: tracker,
      manifestDir,
      loadDeduplicator: options.reloadFromExports
        ? undefined
        : async sourceId => new Deduplicator(sourceId, options.seen ?? []),
      clock,
      createRunId: () => 'run-1',
    })
    return { clock, store, tracker, orchestrator }
  }

  const january = { start: day('2024-01-01'), end: day('2024-01-30') }

  it('keeps going past a failed unit and stops the watermark before it', async () => {
    const { store, orchestrator } = setup()
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-30'),
      fetch: async unit =>
        unit.meta.day === '2024-01-15'
          ? fail(new TerminalRequestError('HTTP 404: Not Found', { statusCode: 404 }))
          : ok(unit.meta.day),
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.state).toBe('Idle')
    expect(report.metrics.unitsSucceeded).toBe(29)
    expect(report.metrics.unitsFailed).toBe(1)
    expect(report.files).toHaveLength(29)
    expect(report.watermarks).toEqual([{ dataset: 'rates', previous: undefined, next: '2024-01-14' }])
    expect(store.entries.get('fake:rates')).toBe('2024-01-14')
    expect(report.manifest).toEqual([
      {
        unitKey: 'rates:2024-01-15',
        dataset: 'rates',
        status: 'failed',
        errorKind: 'TerminalRequestError',
        message: 'HTTP 404: Not Found',
        attempts: 1,
      },
    ])

    const exported = await readdir(join(rawDir, 'fake'))
    expect(exported).toHaveLength(29)
    expect(exported).not.toContain('fake_rates_20240115.jsonl')

    const written: unknown = JSON.parse(await readFile(join(manifestDir, 'fake', 'run-1.json'), 'utf8'))
    expect(written).toMatchObject({ runId: 'run-1', sourceId: 'fake', state: 'Idle' })
  })

  it('advances to the highest successful cursor under the max policy', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-30'),
      manifest: { watermarkPolicy: 'max' },
      fetch: async unit =>
        unit.meta.day === '2024-01-15' ? fail(new TerminalRequestError('HTTP 400: Bad Request')) : ok(unit.meta.day),
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.watermarks).toEqual([{ dataset: 'rates', previous: undefined, next: '2024-01-30' }])
  })

  it('resumes from the stored watermark on incremental runs', async () => {
    const seenWatermarks: Array<Cursor | undefined> = []
    const { orchestrator } = setup({ watermarks: { 'fake:rates': '2024-01-05' } })
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-10'),
      onWatermark: cursor => seenWatermarks.push(cursor),
    })

    const report = await orchestrator.run(adapter, {
      range: { start: day('2024-01-01'), end: day('2024-01-10') },
      mode: 'incremental',
    })

    expect(seenWatermarks).toEqual(['2024-01-05'])
    expect(adapter.fetchCalls).toEqual(days('2024-01-06', '2024-01-10'))
    expect(report.watermarks).toEqual([{ dataset: 'rates', previous: '2024-01-05', next: '2024-01-10' }])
  })

  it('hides watermarks from full runs', async () => {
    const seenWatermarks: Array<Cursor | undefined> = []
    const { orchestrator } = setup({ watermarks: { 'fake:rates': '2024-01-05' } })
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-03'),
      onWatermark: cursor => seenWatermarks.push(cursor),
    })

    await orchestrator.run(adapter, { range: { start: day('2024-01-01'), end: day('2024-01-03') }, mode: 'full' })

    expect(seenWatermarks).toEqual([undefined])
    expect(adapter.fetchCalls).toEqual(['2024-01-01', '2024-01-02', '2024-01-03'])
  })

  it('never reads or advances full-refresh datasets', async () => {
    const seenWatermarks: Array<Cursor | undefined> = []
    const { store, orchestrator } = setup({ watermarks: { 'fake:rates': '2024-01-01' } })
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-03'),
      manifest: { fullRefreshDatasets: ['rates'] },
      onWatermark: cursor => seenWatermarks.push(cursor),
    })

    const report = await orchestrator.run(adapter, {
      range: { start: day('2024-01-01'), end: day('2024-01-03') },
      mode: 'incremental',
    })

    expect(seenWatermarks).toEqual([undefined])
    expect(report.watermarks).toEqual([])
    expect(store.entries.get('fake:rates')).toBe('2024-01-01')
    expect(store.writes).toBe(0)
  })

  it('aborts before enumeration when the health check fails', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({ days: days('2024-01-01', '2024-01-03'), healthy: false })

    await expect(orchestrator.run(adapter, { range: january, mode: 'incremental' })).rejects.toThrow(
      "Health check failed for source 'fake'"
    )
    expect(adapter.fetchCalls).toEqual([])
    expect(existsSync(rawDir)).toBe(false)
  })

  it('treats a health check that throws as unhealthy', async () => {
    const { orchestrator } = setup()
    const adapter = {
      ...fakeAdapter({ days: [] }),
      healthCheck: vi.fn(async (): Promise<boolean> => {
        throw new Error('socket hang up')
      }),
    }

    await expect(orchestrator.run(adapter, { range: january, mode: 'incremental' })).rejects.toBeInstanceOf(
      TotalSourceUnavailableError
    )
  })

  it('raises TotalSourceUnavailable with the report when every unit fails', async () => {
    const { store, orchestrator } = setup()
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-03'),
      fetch: async () => fail(new TerminalRequestError('HTTP 401: Unauthorized', { statusCode: 401 })),
    })

    let caught: unknown
    try {
      await orchestrator.run(adapter, { range: january, mode: 'incremental' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(TotalSourceUnavailableError)
    const report: RunReport | undefined = caught instanceof TotalSourceUnavailableError ? caught.report : undefined
    expect(report?.state).toBe('Failed')
    expect(report?.metrics.unitsFailed).toBe(3)
    expect(report?.manifest.map(entry => entry.unitKey)).toEqual([
      'rates:2024-01-01',
      'rates:2024-01-02',
      'rates:2024-01-03',
    ])
    expect(store.writes).toBe(0)
    expect(existsSync(join(manifestDir, 'fake', 'run-1.json'))).toBe(true)
  })

  it('ends idle with an empty report when there is nothing to collect', async () => {
    const { orchestrator } = setup()
    const report = await orchestrator.run(fakeAdapter({ days: [] }), { range: january, mode: 'incremental' })

    expect(report.state).toBe('Idle')
    expect(report.results).toEqual([])
    expect(report.manifest).toEqual([])
    expect(existsSync(join(manifestDir, 'fake'))).toBe(false)
  })

  it('retries transient failures and counts every attempt', async () => {
    const { clock, orchestrator } = setup()
    let calls = 0
    const adapter = fakeAdapter({
      days: ['2024-01-01'],
      fetch: async unit => {
        calls++
        return calls === 1 ? fail(new RetryableNetworkError('HTTP 503: Service Unavailable')) : ok(unit.meta.day)
      },
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.results[0]).toMatchObject({ status: 'succeeded', attempts: 2 })
    expect(report.metrics.fetchAttempts).toBe(2)
    expect(clock.sleeps).toEqual([100])
  })

  it('fails only the unit whose cost estimate is over the limit', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-03'),
      fetch: async (unit, ctx) =>
        ctx.costGuard.guarded(
          async () => ok(unit.meta.day === '2024-01-02' ? 5000 : 10),
          async () => ok(unit.meta.day)
        ),
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.results.map(result => result.status)).toEqual(['succeeded', 'failed', 'succeeded'])
    expect(report.results[1]).toMatchObject({
      errorKind: 'CostExceeded',
      message: 'Estimated cost 5000 exceeds limit 1000',
    })
    expect(adapter.fetchCalls).toEqual(['2024-01-01', '2024-01-02', '2024-01-03'])
  })

  it('fails a unit whose payload cannot be normalized', async () => {
    const { orchestrator } = setup()
    const base = fakeAdapter({ days: days('2024-01-01', '2024-01-02') })
    const adapter: SourceAdapter<string, DayMeta> = {
      ...base,
      normalize(payload, unit, ctx) {
        if (payload === '2024-01-02') throw new ParseError('Unexpected payload shape')
        return base.normalize(payload, unit, ctx)
      },
    }

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.results[1]).toMatchObject({ status: 'failed', errorKind: 'ParseError', attempts: 1 })
    expect(report.watermarks).toEqual([{ dataset: 'rates', previous: undefined, next: '2024-01-01' }])
  })

  it('drops records already exported earlier in the same run', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({
      days: ['2024-01-01', '2024-01-02'],
      fingerprints: iso => (iso === '2024-01-01' ? ['fp-shared', 'fp-a'] : ['fp-shared', 'fp-b']),
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.metrics.recordsDuplicate).toBe(1)
    expect(report.metrics.recordsExported).toBe(3)
    const second = await readFile(join(rawDir, 'fake', 'fake_rates_20240102.jsonl'), 'utf8')
    expect(second).toBe(
      '{"source":"fake","timestamp_collected":"2024-02-01T06:00:00.000Z","date":"2024-01-02","value":1,"fingerprint":"fp-b"}\n'
    )
  })

  it('does not export again what an earlier run wrote', async () => {
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-03'),
      manifest: { supportsIncremental: false, watermarkPolicy: 'max' },
      fingerprints: iso => [`fp-${iso}`],
    })

    const first = await setup({ reloadFromExports: true }).orchestrator.run(adapter, {
      range: january,
      mode: 'full',
    })
    const second = await setup({ reloadFromExports: true }).orchestrator.run(adapter, {
      range: january,
      mode: 'full',
    })

    expect(first.metrics.recordsExported).toBe(3)
    expect(second.metrics.recordsDuplicate).toBe(3)
    expect(second.metrics.recordsExported).toBe(0)
    expect(second.files).toEqual([])
    expect((await readdir(join(rawDir, 'fake'))).sort()).toEqual([
      'fake_rates_20240101.jsonl',
      'fake_rates_20240102.jsonl',
      'fake_rates_20240103.jsonl',
    ])
  })

  it('writes one file per dataset and date across the units of a run', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-05'),
      manifest: { maxConcurrency: 2 },
      exportDay: () => '2024-01-31',
      fingerprints: iso => [`fp-${iso}`],
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(await readdir(join(rawDir, 'fake'))).toEqual(['fake_rates_20240131.jsonl'])
    expect(report.files).toEqual([
      { path: join(rawDir, 'fake', 'fake_rates_20240131.jsonl'), dataset: 'rates', format: 'jsonl', records: 5 },
    ])
    expect(report.metrics.filesExported).toBe(1)
    const lines = (await readFile(join(rawDir, 'fake', 'fake_rates_20240131.jsonl'), 'utf8')).trim().split('\n')
    expect(lines).toHaveLength(5)
  })

  it('keeps the earlier unit of a shared fingerprint when a later one fetches first', async () => {
    const { orchestrator } = setup()
    let secondFetched: () => void = () => undefined
    const secondDone = new Promise<void>(resolve => {
      secondFetched = resolve
    })
    const adapter = fakeAdapter({
      days: ['2024-01-01', '2024-01-02'],
      manifest: { maxConcurrency: 2 },
      fingerprints: () => ['fp-shared'],
      fetch: async unit => {
        if (unit.meta.day === '2024-01-02') {
          secondFetched()
          return ok(unit.meta.day)
        }
        await secondDone
        await new Promise<void>(resolve => setTimeout(resolve, 20))
        return ok(unit.meta.day)
      },
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.results).toMatchObject([
      { unitKey: 'rates:2024-01-01', status: 'succeeded', duplicates: 0 },
      { unitKey: 'rates:2024-01-02', status: 'succeeded', duplicates: 1 },
    ])
    expect(await readdir(join(rawDir, 'fake'))).toEqual(['fake_rates_20240101.jsonl'])
  })

  it('skips units whose fingerprint was exported by an earlier run', async () => {
    const { orchestrator } = setup({ seen: ['fp-2024-01-02'] })
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-03'),
      manifest: { supportsIncremental: false, watermarkPolicy: 'max' },
      unitFingerprint: iso => `fp-${iso}`,
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(adapter.fetchCalls).toEqual(['2024-01-01', '2024-01-03'])
    expect(report.results[1]).toEqual({
      unitKey: 'rates:2024-01-02',
      dataset: 'rates',
      order: 1,
      status: 'skipped',
      reason: 'ALREADY_SEEN',
    })
    expect(report.manifest).toEqual([])
    expect(report.watermarks).toEqual([])
  })

  it('ignores repeated unit keys from enumeration', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({ days: ['2024-01-01', '2024-01-01', '2024-01-02'] })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.results.map(result => result.unitKey)).toEqual(['rates:2024-01-01', 'rates:2024-01-02'])
  })

  it('processes units in parallel lanes and reports them in enumeration order', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-10'),
      manifest: { maxConcurrency: 3 },
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.results.map(result => result.order)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])
    expect(report.metrics.unitsSucceeded).toBe(10)
    expect(report.watermarks).toEqual([{ dataset: 'rates', previous: undefined, next: '2024-01-10' }])
  })

  it('raises TotalSourceUnavailable when enumeration fails before any unit', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({ days: days('2024-01-01', '2024-01-03'), enumerationFailsAfter: 0 })

    await expect(orchestrator.run(adapter, { range: january, mode: 'incremental' })).rejects.toThrow(
      'Enumeration failed: HTTP 403: Forbidden'
    )
  })

  it('keeps the units collected before enumeration failed', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({ days: days('2024-01-01', '2024-01-03'), enumerationFailsAfter: 2 })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental' })

    expect(report.metrics.unitsSucceeded).toBe(2)
    expect(report.manifest).toEqual([
      {
        unitKey: 'enumeration',
        dataset: '*',
        status: 'failed',
        errorKind: 'TerminalRequestError',
        message: 'HTTP 403: Forbidden',
        attempts: 0,
      },
    ])
  })

  it('cancels in-flight work when the run deadline passes', async () => {
    const { orchestrator } = setup()
    const adapter = fakeAdapter({
      days: days('2024-01-01', '2024-01-05'),
      fetch: async (unit, ctx) => {
        if (unit.meta.day === '2024-01-01') return ok(unit.meta.day)
        await new Promise<void>(resolve => ctx.signal.addEventListener('abort', () => resolve(), { once: true }))
        return fail(new RunCancelledError('Request aborted'))
      },
    })

    const report = await orchestrator.run(adapter, { range: january, mode: 'incremental', deadlineMs: 20 })

    expect(report.cancelled).toBe(true)
    expect(report.state).toBe('Idle')
    expect(report.results.map(result => result.status)).toEqual(['succeeded', 'cancelled'])
    expect(adapter.fetchCalls).toEqual(['2024-01-01', '2024-01-02'])
    expect(report.manifest.map(entry => [entry.unitKey, entry.status])).toEqual([
      ['rates:2024-01-02', 'cancelled'],
      ['enumeration', 'cancelled'],
    ])
    expect(report.manifest[1]).toEqual({
      unitKey: 'enumeration',
      dataset: '*',
      status: 'cancelled',
      errorKind: 'RunCancelled',
      message: 'Run cancelled before enumeration finished',
      attempts: 0,
    })
    expect(report.watermarks).toEqual([{ dataset: 'rates', previous: undefined, next: '2024-01-01' }])
  })
})
