/**
 * Collection Framework
 *
 * Scheduled, incremental collection of macro-economic and news data from
 * heterogeneous public sources into raw (bronze) export files.
 */

// Core types
export * from './types.js'
export * from './errors.js'

// Registry
export { AdapterRegistry } from './registry.js'

// Fetch layer
export { HttpFetcher, parseRetryAfter, DEFAULT_USER_AGENT } from './fetch/http-fetcher.js'
export type { HttpFetcherOptions, HttpResponse, RequestOptions } from './fetch/http-fetcher.js'
export { RateGovernor } from './fetch/rate-governor.js'
export type { RateGovernorOptions } from './fetch/rate-governor.js'
export { ResilienceEngine, computeBackoffMs } from './fetch/resilience.js'
export type { AttemptContext, ExecuteOptions, Operation } from './fetch/resilience.js'

// Processing
export { CostGuard } from './process/cost-guard.js'
export { Deduplicator } from './process/dedupe.js'
export type { DedupeOutcome, FingerprintSource } from './process/dedupe.js'
export { ExportSession, ExportSink, buildFileName, encodeCsv, encodeJsonl } from './process/export-sink.js'
export type { ExportBatch } from './process/export-sink.js'
export { WatermarkTracker, compareCursors, maxCursor } from './process/watermark.js'
export type { WatermarkStore } from './process/watermark.js'
export { FileWatermarkStore, RedisWatermarkStore } from './process/watermark-stores.js'
export { writeRunManifest } from './process/run-manifest.js'
export { createKeywordClassifier } from './process/classify.js'

// Orchestration
export { CollectionOrchestrator, computeWatermarkTargets } from './orchestrator.js'
export type { OrchestratorOptions } from './orchestrator.js'
export { Lifecycle, canTransition } from './lifecycle.js'
export { systemClock } from './clock.js'
export type { Clock } from './clock.js'

// Adapters
export { registerAllAdapters } from './adapters/index.js'
