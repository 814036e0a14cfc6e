/**
 * Wires settings into a ready-to-run collector: governor, resilience
 * engine, HTTP client, cost guard, export sink, watermark store and
 * the adapter registry.
 */

import { join } from 'node:path'
import { loggers } from '../config/logger.js'
import { createRedisClient } from '../config/redis.js'
import type { CollectorSettings } from '../config/settings.js'
import { registerAllAdapters } from '../collection/adapters/index.js'
import { HttpFetcher } from '../collection/fetch/http-fetcher.js'
import { RateGovernor } from '../collection/fetch/rate-governor.js'
import { ResilienceEngine } from '../collection/fetch/resilience.js'
import { CollectionOrchestrator } from '../collection/orchestrator.js'
import { CostGuard } from '../collection/process/cost-guard.js'
import { ExportSink } from '../collection/process/export-sink.js'
import { WatermarkTracker, type WatermarkStore } from '../collection/process/watermark.js'
import { FileWatermarkStore, RedisWatermarkStore } from '../collection/process/watermark-stores.js'
import { AdapterRegistry } from '../collection/registry.js'

export interface CollectorRuntime {
  settings: CollectorSettings
  registry: AdapterRegistry
  http: HttpFetcher
  governor: RateGovernor
  watermarks: WatermarkTracker
  orchestrator: CollectionOrchestrator
  close(): Promise<void>
}

export function createWatermarkStore(settings: CollectorSettings): WatermarkStore {
  if (settings.watermarkBackend === 'redis') {
    return new RedisWatermarkStore({
      client: createRedisClient(settings.redis),
      hashKey: settings.redis.watermarkKey,
      ownsClient: true,
    })
  }
  return new FileWatermarkStore(join(settings.stateDir, 'watermarks.json'))
}

export function createRegistry(settings: CollectorSettings): AdapterRegistry {
  const registry = new AdapterRegistry()
  registerAllAdapters(registry, settings)
  return registry
}

export function createRuntime(settings: CollectorSettings): CollectorRuntime {
  const governor = new RateGovernor({ defaults: settings.politeness })
  const engine = new ResilienceEngine({ governor, defaultPolicy: settings.retry })
  const http = new HttpFetcher({
    userAgent: settings.http.userAgent,
    timeoutMs: settings.http.timeoutMs,
    maxSizeBytes: settings.http.maxResponseBytes,
    retryableStatusCodes: settings.retry.retryableStatusCodes,
  })
  const costGuard = new CostGuard({ limit: settings.costLimitBytes })
  const sink = new ExportSink({ rawDir: settings.rawDataDir })
  const watermarks = new WatermarkTracker(createWatermarkStore(settings))

  const orchestrator = new CollectionOrchestrator({
    governor,
    engine,
    http,
    costGuard,
    sink,
    watermarks,
    manifestDir: join(settings.stateDir, 'manifests'),
  })

  const registry = createRegistry(settings)

  loggers.cli.debug('Runtime ready', {
    adapters: registry.list(),
    watermarkBackend: settings.watermarkBackend,
    rawDataDir: settings.rawDataDir,
  })

  return {
    settings,
    registry,
    http,
    governor,
    watermarks,
    orchestrator,
    close: () => watermarks.close(),
  }
}
