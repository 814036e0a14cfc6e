/**
 * Collection Framework Core Types
 *
 * Units, attempts, results, normalized records and the adapter contract.
 */

import type { ILogger } from '@macro-ingest/logger'
import type { CollectionError, CollectionErrorKind } from './errors.js'
import type { HttpFetcher } from './fetch/http-fetcher.js'
import type { CostGuard } from './process/cost-guard.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Outcome of a fallible operation. Expected failures travel as values;
 * only programming errors throw.
 */
export type Result<T, E = CollectionError> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Policies
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
  backoffMultiplier: number
  maxDelayMs: number
  /** Per-attempt deadline; 0 disables */
  attemptTimeoutMs: number
  honorRetryAfter: boolean
  /** Upper bound applied to a server-provided Retry-After */
  maxRetryAfterMs: number
  retryableStatusCodes: readonly number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1500,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  attemptTimeoutMs: 0,
  honorRetryAfter: true,
  maxRetryAfterMs: 60000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

export interface JitterRange {
  minMs: number
  maxMs: number
}

export interface PolitenessConfig {
  /** Minimum spacing between permits for one source */
  minIntervalMs: number
  /** Uniform random delay added on top of minIntervalMs */
  jitter: JitterRange
}

export const DEFAULT_POLITENESS: PolitenessConfig = {
  minIntervalMs: 1500,
  jitter: { minMs: 0, maxMs: 500 },
}

// ═══════════════════════════════════════════════════════════════════════════════
// Units and Attempts
// ═══════════════════════════════════════════════════════════════════════════════

export interface DateRange {
  start: Date
  end: Date
}

/**
 * Opaque, ordered position in a source's data (usually an ISO date).
 */
export type Cursor = string

/**
 * Smallest independently retryable piece of collection work.
 * Immutable once enumerated.
 */
export interface CollectionUnit<M = unknown> {
  readonly sourceId: string
  /** Unique within the run */
  readonly key: string
  /** Watermark dataset this unit contributes to */
  readonly dataset: string
  readonly range?: DateRange
  /** Partition date used in export file names; defaults to the run date */
  readonly exportDate?: Date
  /** Known before fetch for document units; lets seen documents skip the network */
  readonly fingerprint?: string
  readonly meta: M
}

export type AttemptOutcome = 'success' | 'retryable_failure' | 'terminal_failure'

export interface FetchAttempt {
  readonly sourceId: string
  readonly unitKey: string
  /** 1-based */
  readonly attempt: number
  readonly outcome: AttemptOutcome
  readonly latencyMs: number
  readonly at: Date
  readonly statusCode?: number
  readonly errorKind?: CollectionErrorKind
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalized Records
// ═══════════════════════════════════════════════════════════════════════════════

export type BronzeValue = string | number | boolean | null | BronzeValue[] | { [key: string]: BronzeValue }

/**
 * A bronze row: source fields as received plus collection metadata.
 * Missing values stay null; nothing is imputed.
 */
export interface BronzeFields {
  source: string
  timestamp_collected: string
  [field: string]: BronzeValue
}

export interface NormalizedRecord {
  /** Export dataset (file) the record belongs to */
  dataset: string
  fingerprint?: string
  fields: BronzeFields
}

export type DropReason = 'NUMERIC_COERCION_FAILED' | 'MISSING_REQUIRED_FIELD' | 'OUT_OF_RANGE'

export interface DroppedRow {
  reason: DropReason
  detail: string
}

export interface NormalizeOutcome {
  records: NormalizedRecord[]
  dropped: DroppedRow[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Unit Results
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExportedFile {
  path: string
  dataset: string
  format: ExportFormat
  records: number
}

interface UnitResultBase {
  readonly unitKey: string
  readonly dataset: string
  /** Enumeration order, 0-based */
  readonly order: number
}

export type CollectionResult =
  | (UnitResultBase & {
      readonly status: 'succeeded'
      readonly attempts: number
      readonly recordsNormalized: number
      readonly recordsDropped: number
      readonly duplicates: number
      readonly files: readonly ExportedFile[]
      readonly cursor?: Cursor
    })
  | (UnitResultBase & {
      readonly status: 'failed'
      readonly attempts: number
      readonly errorKind: CollectionErrorKind
      readonly message: string
      readonly statusCode?: number
    })
  | (UnitResultBase & { readonly status: 'skipped'; readonly reason: 'ALREADY_SEEN' })
  | (UnitResultBase & { readonly status: 'cancelled'; readonly attempts: number })

export type CollectionStatus = CollectionResult['status']

// ═══════════════════════════════════════════════════════════════════════════════
// Adapter Contract
// ═══════════════════════════════════════════════════════════════════════════════

export type ExportFormat = 'csv' | 'jsonl'

/**
 * How a dataset's watermark moves at the end of a run:
 * - max: highest cursor among successful units
 * - contiguous: last cursor before the first failed unit in enumeration order
 */
export type WatermarkPolicy = 'max' | 'contiguous'

export interface AdapterManifest {
  id: string
  name: string
  version: string
  exportFormat: ExportFormat
  baseUrls: readonly string[]
  supportsIncremental: boolean
  /** Datasets always fetched in full; their watermarks are never read or advanced */
  fullRefreshDatasets?: readonly string[]
  watermarkPolicy: WatermarkPolicy
  /** Range used when the caller gives no start date */
  defaultLookbackDays: number
  politeness?: Partial<PolitenessConfig>
  /** Bounded parallelism across units; 1 means sequential */
  maxConcurrency?: number
  retryPolicy?: Partial<RetryPolicy>
}

export interface AdapterContext {
  sourceId: string
  runId: string
  collectedAt: Date
  logger: ILogger
}

export interface FetchContext extends AdapterContext {
  http: HttpFetcher
  costGuard: CostGuard
  signal: AbortSignal
  attempt: number
}

/**
 * Read-only view of a source's watermarks. Returns undefined for
 * datasets that are never incremental or when the run is a full run.
 */
export interface WatermarkReader {
  get(dataset: string): Cursor | undefined
}

export interface EnumerationContext extends AdapterContext {
  range: DateRange
  incremental: boolean
  watermarks: WatermarkReader
  signal: AbortSignal
  /**
   * Run a discovery request (e.g. a feed listing) through the resilience
   * engine and rate governor.
   */
  discover<T>(key: string, op: (ctx: FetchContext) => Promise<Result<T>>): Promise<Result<T>>
}

export interface HealthCheckContext extends AdapterContext {
  http: HttpFetcher
  signal: AbortSignal
}

/**
 * A source adapter. Adapters own enumeration, fetching and normalization;
 * retry, pacing, dedupe, export and watermarks belong to the framework.
 */
export interface SourceAdapter<P = unknown, M = unknown> {
  readonly manifest: AdapterManifest
  enumerateUnits(ctx: EnumerationContext): AsyncIterable<CollectionUnit<M>>
  /** Single attempt; the framework retries */
  fetch(unit: CollectionUnit<M>, ctx: FetchContext): Promise<Result<P>>
  /** Pure: throws ParseError on malformed payloads */
  normalize(payload: P, unit: CollectionUnit<M>, ctx: AdapterContext): NormalizeOutcome
  healthCheck(ctx: HealthCheckContext): Promise<boolean>
  /** Cursor a successful unit reached; defaults to the unit's range end */
  watermarkCursor?(unit: CollectionUnit<M>, records: readonly NormalizedRecord[]): Cursor | undefined
}

export type AnySourceAdapter = SourceAdapter<unknown, unknown>

// ═══════════════════════════════════════════════════════════════════════════════
// Runs
// ═══════════════════════════════════════════════════════════════════════════════

export type RunMode = 'incremental' | 'full'

export interface RunRequest {
  range: DateRange
  mode: RunMode
  /** Overall run deadline; 0 or undefined disables */
  deadlineMs?: number
}

export type RunState = 'Idle' | 'Enumerating' | 'FetchingUnit' | 'Normalizing' | 'Deduplicating' | 'Exporting' | 'Failed'

export interface ManifestEntry {
  unitKey: string
  dataset: string
  status: 'failed' | 'cancelled'
  errorKind?: CollectionErrorKind
  message: string
  attempts: number
}

export interface WatermarkAdvance {
  dataset: string
  previous?: Cursor
  next: Cursor
}

export interface RunMetrics {
  unitsAttempted: number
  unitsSucceeded: number
  unitsFailed: number
  unitsSkipped: number
  unitsCancelled: number
  fetchAttempts: number
  recordsNormalized: number
  recordsDropped: number
  recordsDuplicate: number
  recordsExported: number
  filesExported: number
  failureRate: number
}

export interface RunReport {
  runId: string
  sourceId: string
  mode: RunMode
  range: DateRange
  startedAt: Date
  finishedAt: Date
  durationMs: number
  state: 'Idle' | 'Failed'
  cancelled: boolean
  results: CollectionResult[]
  files: ExportedFile[]
  manifest: ManifestEntry[]
  watermarks: WatermarkAdvance[]
  metrics: RunMetrics
}
