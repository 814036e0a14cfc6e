/**
 * Watermark persistence backends.
 *
 * - FileWatermarkStore: one JSON document, replaced atomically (temp + rename)
 * - RedisWatermarkStore: one hash, field "{source}:{dataset}", shared by workers
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { createId } from '@paralleldrive/cuid2'
import { ParseError } from '../errors.js'
import type { Cursor } from '../types.js'
import { isRecord } from '../utils/fields.js'
import type { WatermarkStore } from './watermark.js'

const FILE_FORMAT_VERSION = 1

interface WatermarkFile {
  version: number
  updatedAt: string
  watermarks: Record<string, Cursor>
}

export class FileWatermarkStore implements WatermarkStore {
  readonly kind = 'file'
  private readonly path: string

  constructor(path: string) {
    this.path = path
  }

  async readAll(): Promise<Map<string, Cursor>> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isNotFound(error)) return new Map()
      throw error
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      throw new ParseError(`Watermark file ${this.path} is not valid JSON`, { cause: error })
    }

    if (!isRecord(parsed) || !isRecord(parsed.watermarks)) {
      throw new ParseError(`Watermark file ${this.path} has no watermarks object`)
    }

    const entries = new Map<string, Cursor>()
    for (const [key, value] of Object.entries(parsed.watermarks)) {
      if (typeof value === 'string') entries.set(key, value)
    }
    return entries
  }

  async writeEntries(entries: Map<string, Cursor>): Promise<void> {
    const current = await this.readAll()
    for (const [key, cursor] of entries) {
      current.set(key, cursor)
    }

    const document: WatermarkFile = {
      version: FILE_FORMAT_VERSION,
      updatedAt: new Date().toISOString(),
      watermarks: Object.fromEntries([...current.entries()].sort(([a], [b]) => a.localeCompare(b))),
    }

    await mkdir(dirname(this.path), { recursive: true })
    const tempPath = `${this.path}.${createId()}.tmp`
    await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8')
    await rename(tempPath, this.path)
  }
}

/**
 * The subset of the Redis client the store uses.
 */
export interface RedisHashClient {
  hgetall(key: string): Promise<Record<string, string>>
  hset(key: string, values: Record<string, string>): Promise<number>
  quit(): Promise<unknown>
}

export const DEFAULT_WATERMARK_HASH_KEY = 'collector:watermarks'

export interface RedisWatermarkStoreOptions {
  client: RedisHashClient
  hashKey?: string
  /** Whether close() should quit the client */
  ownsClient?: boolean
}

export class RedisWatermarkStore implements WatermarkStore {
  readonly kind = 'redis'
  private readonly client: RedisHashClient
  private readonly hashKey: string
  private readonly ownsClient: boolean

  constructor(options: RedisWatermarkStoreOptions) {
    this.client = options.client
    this.hashKey = options.hashKey ?? DEFAULT_WATERMARK_HASH_KEY
    this.ownsClient = options.ownsClient ?? false
  }

  async readAll(): Promise<Map<string, Cursor>> {
    const hash = await this.client.hgetall(this.hashKey)
    return new Map(Object.entries(hash))
  }

  async writeEntries(entries: Map<string, Cursor>): Promise<void> {
    if (entries.size === 0) return
    await this.client.hset(this.hashKey, Object.fromEntries(entries))
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.client.quit()
    }
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}
