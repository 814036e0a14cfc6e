import type { AdapterRegistry } from '../../collection/registry.js'

export function formatSourceLine(registry: AdapterRegistry, sourceId: string): string {
  const adapter = registry.get(sourceId)
  if (!adapter) return `${sourceId}: not registered`
  const m = adapter.manifest
  const incremental = m.supportsIncremental ? `incremental (${m.watermarkPolicy})` : 'full only'
  const fullRefresh = m.fullRefreshDatasets?.length ? `, full refresh: ${m.fullRefreshDatasets.join(', ')}` : ''
  return `${m.id.padEnd(8)} ${m.name} | ${m.exportFormat} | ${incremental}${fullRefresh} | concurrency ${m.maxConcurrency ?? 1}`
}

export async function runSourcesCommand(registry: AdapterRegistry): Promise<number> {
  for (const id of registry.list()) {
    console.log(formatSourceLine(registry, id))
  }
  return 0
}
