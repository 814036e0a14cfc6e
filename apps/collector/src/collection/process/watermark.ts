/**
 * Watermark Tracker
 *
 * Persistent per-(source, dataset) high-water marks for incremental
 * collection. Advances are monotonic: an equal or older cursor is a no-op.
 *
 * Advances happen in memory and are persisted by flush(). Flush re-reads
 * the store and keeps the greater cursor for every key, so two processes
 * flushing the same source never move a watermark backwards.
 */

import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../../config/logger.js'
import type { Cursor } from '../types.js'
import { Mutex } from '../utils/mutex.js'

export interface WatermarkStore {
  readonly kind: string
  readAll(): Promise<Map<string, Cursor>>
  /** Upsert the given entries */
  writeEntries(entries: Map<string, Cursor>): Promise<void>
  close?(): Promise<void>
}

const DATE_PREFIX = /^\d{4}-\d{2}(-\d{2})?/
const INTEGER = /^-?\d+$/

/**
 * Order two cursors: date-like cursors by time, integers numerically,
 * anything else lexicographically.
 */
export function compareCursors(a: Cursor, b: Cursor): number {
  if (DATE_PREFIX.test(a) && DATE_PREFIX.test(b)) {
    const ta = Date.parse(a)
    const tb = Date.parse(b)
    if (Number.isFinite(ta) && Number.isFinite(tb) && ta !== tb) {
      return ta < tb ? -1 : 1
    }
  }

  if (INTEGER.test(a) && INTEGER.test(b)) {
    const na = BigInt(a)
    const nb = BigInt(b)
    return na === nb ? 0 : na < nb ? -1 : 1
  }

  return a === b ? 0 : a < b ? -1 : 1
}

export function maxCursor(a: Cursor | undefined, b: Cursor | undefined): Cursor | undefined {
  if (a === undefined) return b
  if (b === undefined) return a
  return compareCursors(a, b) >= 0 ? a : b
}

export function watermarkKey(sourceId: string, dataset: string): string {
  return `${sourceId}:${dataset}`
}

export class WatermarkTracker {
  private readonly store: WatermarkStore
  private readonly log: ILogger
  private readonly mutex = new Mutex()
  private entries = new Map<string, Cursor>()
  private readonly dirty = new Set<string>()
  private loaded = false

  constructor(store: WatermarkStore, logger?: ILogger) {
    this.store = store
    this.log = logger ?? loggers.watermark
  }

  get isLoaded(): boolean {
    return this.loaded
  }

  async load(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const stored = await this.store.readAll()
      for (const [key, cursor] of stored) {
        const merged = maxCursor(this.entries.get(key), cursor)
        if (merged !== undefined) this.entries.set(key, merged)
      }
      this.loaded = true
      this.log.debug('Watermarks loaded', { store: this.store.kind, count: stored.size })
    })
  }

  get(sourceId: string, dataset: string): Cursor | undefined {
    return this.entries.get(watermarkKey(sourceId, dataset))
  }

  /**
   * Move a watermark forward. Returns false when cursor is not newer.
   */
  advance(sourceId: string, dataset: string, cursor: Cursor): boolean {
    const key = watermarkKey(sourceId, dataset)
    const current = this.entries.get(key)
    if (current !== undefined && compareCursors(cursor, current) <= 0) {
      return false
    }

    this.entries.set(key, cursor)
    this.dirty.add(key)
    this.log.info('WATERMARK_ADVANCED', {
      event_name: 'WATERMARK_ADVANCED',
      sourceId,
      dataset,
      previous: current,
      next: cursor,
    })
    return true
  }

  /**
   * Persist pending advances. Returns the number of entries written.
   */
  async flush(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      if (this.dirty.size === 0) return 0

      const pending = new Set(this.dirty)
      this.dirty.clear()

      try {
        const stored = await this.store.readAll()
        const toWrite = new Map<string, Cursor>()
        for (const key of pending) {
          const merged = maxCursor(this.entries.get(key), stored.get(key))
          if (merged === undefined) continue
          this.entries.set(key, merged)
          if (merged !== stored.get(key)) toWrite.set(key, merged)
        }

        if (toWrite.size > 0) {
          await this.store.writeEntries(toWrite)
        }
        return toWrite.size
      } catch (error) {
        for (const key of pending) this.dirty.add(key)
        throw error
      }
    })
  }

  snapshot(): Record<string, Cursor> {
    return Object.fromEntries(this.entries)
  }

  async close(): Promise<void> {
    await this.store.close?.()
  }
}
