import type { AdapterRegistry } from '../../collection/registry.js'
import { fail, ok, type AnySourceAdapter, type Result } from '../../collection/types.js'

/**
 * `--source <id>` or `--source all`.
 */
export function resolveSources(registry: AdapterRegistry, sourceId: string): Result<AnySourceAdapter[], string> {
  if (!sourceId) {
    return fail('Missing --source <id|all>')
  }
  if (sourceId === 'all') {
    return ok(registry.all())
  }
  const adapter = registry.get(sourceId)
  if (!adapter) {
    return fail(`Unknown source '${sourceId}'. Known sources: ${registry.list().join(', ')}`)
  }
  return ok([adapter])
}
