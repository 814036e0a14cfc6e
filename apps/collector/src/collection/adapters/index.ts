/**
 * Adapter Registration
 *
 * Registers all production adapters with a registry.
 * Adapters are explicitly registered here - no auto-discovery.
 */

import type { CollectorSettings } from '../../config/settings.js'
import type { AdapterRegistry } from '../registry.js'
import { createBoeAdapter } from './boe/index.js'
import { createEcbAdapter } from './ecb/index.js'
import { createFedAdapter } from './fed/index.js'
import { createFredAdapter } from './fred/index.js'
import { createGdeltAdapter } from './gdelt/index.js'

/**
 * Register all production adapters.
 * Credentials are read from settings; adapters without them still register
 * and fail their health check with a ConfigError message.
 */
export function registerAllAdapters(registry: AdapterRegistry, settings: CollectorSettings): void {
  registry.register(createFredAdapter({ apiKey: settings.fred.apiKey }))
  registry.register(createEcbAdapter())
  registry.register(createFedAdapter())
  registry.register(createBoeAdapter())
  registry.register(
    createGdeltAdapter({
      projectId: settings.bigquery.projectId,
      accessToken: settings.bigquery.accessToken,
      costLimitBytes: settings.costLimitBytes,
    })
  )
}

export * from './fred/index.js'
export * from './ecb/index.js'
export * from './fed/index.js'
export * from './boe/index.js'
export * from './gdelt/index.js'
