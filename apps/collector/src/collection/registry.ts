/**
 * Adapter Registry
 *
 * Registry for source adapters. Adapters must be explicitly registered; no auto-discovery.
 */

import type { AnySourceAdapter } from './types.js'

/**
 * In-memory adapter registry implementation.
 * Adapters are registered at startup and remain immutable during runtime.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<string, AnySourceAdapter>()

  /**
   * Register an adapter.
   * @throws Error if an adapter with the same ID is already registered
   */
  register(adapter: AnySourceAdapter): void {
    const id = adapter.manifest.id
    if (this.adapters.has(id)) {
      throw new Error(`Adapter with ID '${id}' is already registered`)
    }
    this.adapters.set(id, adapter)
  }

  get(sourceId: string): AnySourceAdapter | undefined {
    return this.adapters.get(sourceId)
  }

  list(): string[] {
    return Array.from(this.adapters.keys()).sort()
  }

  all(): AnySourceAdapter[] {
    return this.list().flatMap(id => this.adapters.get(id) ?? [])
  }

  size(): number {
    return this.adapters.size
  }
}
