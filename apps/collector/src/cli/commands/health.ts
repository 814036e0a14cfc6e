import { createId } from '@paralleldrive/cuid2'
import { loggers } from '../../config/logger.js'
import type { AnySourceAdapter } from '../../collection/types.js'
import type { CollectorRuntime } from '../runtime.js'
import { resolveSources } from './resolve-sources.js'

interface HealthCommandArgs {
  sourceId: string
}

const log = loggers.cli

async function checkOne(adapter: AnySourceAdapter, runtime: Pick<CollectorRuntime, 'http' | 'governor'>): Promise<boolean> {
  const sourceId = adapter.manifest.id
  const controller = new AbortController()
  try {
    if (adapter.manifest.politeness) {
      runtime.governor.configure(sourceId, adapter.manifest.politeness)
    }
    await runtime.governor.acquire(sourceId, controller.signal)
    return await adapter.healthCheck({
      sourceId,
      runId: createId(),
      collectedAt: new Date(),
      logger: loggers.adapters.child(sourceId),
      http: runtime.http,
      signal: controller.signal,
    })
  } catch (error) {
    log.warn('Health check threw', { sourceId }, error)
    return false
  }
}

export async function runHealthCommand(
  args: HealthCommandArgs,
  runtime: Pick<CollectorRuntime, 'registry' | 'http' | 'governor'>
): Promise<number> {
  const sources = resolveSources(runtime.registry, args.sourceId)
  if (!sources.ok) {
    console.error(sources.error)
    return 2
  }

  let unhealthy = 0
  for (const adapter of sources.value) {
    const healthy = await checkOne(adapter, runtime)
    if (!healthy) unhealthy++
    console.log(`${adapter.manifest.id}: ${healthy ? 'healthy' : 'UNHEALTHY'}`)
  }
  return unhealthy === 0 ? 0 : 1
}
