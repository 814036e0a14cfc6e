/**
 * Export Sink
 *
 * Writes normalized records to the raw data directory:
 *
 *   {rawDir}/{source}/{source}_{dataset}_{YYYYMMDD}.{csv|jsonl}
 *
 * A unit's files are staged as temp files, synced, then linked into
 * place. Linking fails on an existing name, so a collision moves to the
 * next suffix (_2, _3, ...) and never overwrites an earlier export. If any
 * file of a unit fails, everything that unit wrote is removed.
 *
 * Within one run, an ExportSession appends later units to the file the
 * run already created for the same dataset and date. The combined file is
 * staged and renamed over the run's own file, never over another run's.
 */

import { open, link, mkdir, readdir, readFile, rename, unlink } from 'node:fs/promises'
import { join } from 'node:path'
import { createId } from '@paralleldrive/cuid2'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../../config/logger.js'
import { ExportError } from '../errors.js'
import type { BronzeFields, BronzeValue, ExportedFile, ExportFormat } from '../types.js'
import { toDateStamp } from '../utils/dates.js'
import { isRecord, toSnakeCase } from '../utils/fields.js'
import { Mutex } from '../utils/mutex.js'
import type { FingerprintSource } from './dedupe.js'

export interface ExportBatch {
  sourceId: string
  dataset: string
  format: ExportFormat
  exportDate: Date
  records: readonly BronzeFields[]
}

export interface ExportSinkOptions {
  rawDir: string
  logger?: ILogger
}

const MAX_SUFFIX = 1000

export function buildFileName(
  sourceId: string,
  dataset: string,
  exportDate: Date,
  format: ExportFormat,
  sequence = 1
): string {
  const suffix = sequence > 1 ? `_${sequence}` : ''
  return `${sourceId}_${dataset}_${toDateStamp(exportDate)}${suffix}.${format}`
}

/**
 * Top-level keys to snake_case; nested values are kept as-is.
 */
export function normalizeFieldNames(fields: BronzeFields): Record<string, BronzeValue> {
  const out: Record<string, BronzeValue> = {}
  for (const [key, value] of Object.entries(fields)) {
    out[toSnakeCase(key)] = value
  }
  return out
}

export function encodeJsonl(records: readonly BronzeFields[]): string {
  return records.map(record => JSON.stringify(normalizeFieldNames(record))).join('\n') + '\n'
}

/**
 * CSV with the union of all record keys as header, in first-seen order.
 * Nested values are JSON-encoded; null becomes an empty cell.
 */
export function encodeCsv(records: readonly BronzeFields[]): string {
  const rows = records.map(normalizeFieldNames)
  const columns: string[] = []
  const known = new Set<string>()
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!known.has(key)) {
        known.add(key)
        columns.push(key)
      }
    }
  }

  const cells = rows.map(row => columns.map(column => toCell(row[column])))
  return stringify(cells, { header: true, columns })
}

function toCell(value: BronzeValue | undefined): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

/** A file this run has written, with every record it holds */
interface RunFile {
  path: string
  dataset: string
  format: ExportFormat
  records: BronzeFields[]
}

type RunFiles = Map<string, RunFile>

interface StagedFile {
  batch: ExportBatch
  records: BronzeFields[]
  tempPath: string
  /** The run's earlier file this one replaces */
  replaces?: RunFile
  finalPath?: string
}

function runFileKey(batch: ExportBatch): string {
  return `${batch.sourceId}/${batch.dataset}/${toDateStamp(batch.exportDate)}/${batch.format}`
}

export class ExportSink implements FingerprintSource {
  readonly rawDir: string
  private readonly log: ILogger

  constructor(options: ExportSinkOptions) {
    this.rawDir = options.rawDir
    this.log = options.logger ?? loggers.export
  }

  sourceDir(sourceId: string): string {
    return join(this.rawDir, sourceId)
  }

  /** Start a run: units written through the session share files per dataset and date. */
  openSession(): ExportSession {
    return new ExportSession(this)
  }

  async write(batch: ExportBatch): Promise<ExportedFile | null> {
    const files = await this.writeUnit([batch])
    return files[0] ?? null
  }

  /**
   * Write all batches of one unit, all or nothing. Empty batches are skipped.
   * With `runFiles`, a batch whose dataset and date the run already wrote is
   * appended to that file, and `runFiles` is updated once the unit commits.
   *
   * @throws ExportError when any file cannot be written
   */
  async writeUnit(batches: readonly ExportBatch[], runFiles?: RunFiles): Promise<ExportedFile[]> {
    const nonEmpty = batches.filter(batch => batch.records.length > 0)
    if (nonEmpty.length === 0) return []

    const staged: StagedFile[] = []
    try {
      for (const batch of nonEmpty) {
        const previous = runFiles?.get(runFileKey(batch))
        const records = previous ? [...previous.records, ...batch.records] : [...batch.records]
        staged.push(await this.stage(batch, records, previous))
      }

      for (const file of staged) {
        file.finalPath = file.replaces ? await this.replace(file, file.replaces) : await this.commit(file)
      }
    } catch (error) {
      await this.rollback(staged)
      throw new ExportError(
        `Export failed for ${nonEmpty.map(batch => `${batch.sourceId}/${batch.dataset}`).join(', ')}`,
        { cause: error }
      )
    }

    await Promise.all(staged.map(file => this.remove(file.tempPath)))

    return staged.map(file => {
      const path = file.finalPath ?? file.tempPath
      runFiles?.set(runFileKey(file.batch), {
        path,
        dataset: file.batch.dataset,
        format: file.batch.format,
        records: file.records,
      })
      this.log.info('EXPORT_WRITTEN', {
        event_name: 'EXPORT_WRITTEN',
        sourceId: file.batch.sourceId,
        dataset: file.batch.dataset,
        path,
        records: file.batch.records.length,
        ...(file.replaces ? { appended: true } : {}),
      })
      return {
        path,
        dataset: file.batch.dataset,
        format: file.batch.format,
        records: file.batch.records.length,
      }
    })
  }

  /**
   * Every fingerprint found in the source's JSONL exports.
   */
  async readFingerprints(sourceId: string): Promise<string[]> {
    const files = await this.listFiles(sourceId, 'jsonl')
    const fingerprints: string[] = []
    let malformed = 0

    for (const file of files) {
      const content = await readFile(file, 'utf8')
      for (const line of content.split('\n')) {
        if (!line.trim()) continue
        try {
          const parsed: unknown = JSON.parse(line)
          if (isRecord(parsed) && typeof parsed.fingerprint === 'string') {
            fingerprints.push(parsed.fingerprint)
          }
        } catch {
          malformed++
        }
      }
    }

    if (malformed > 0) {
      this.log.warn('Skipped malformed export lines', { sourceId, malformed })
    }
    return fingerprints
  }

  async listFiles(sourceId: string, format?: ExportFormat): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this.sourceDir(sourceId))
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }

    return names
      .filter(name => name.startsWith(`${sourceId}_`))
      .filter(name => (format ? name.endsWith(`.${format}`) : /\.(csv|jsonl)$/.test(name)))
      .sort()
      .map(name => join(this.sourceDir(sourceId), name))
  }

  private async stage(batch: ExportBatch, records: BronzeFields[], replaces?: RunFile): Promise<StagedFile> {
    const tempPath = await this.stageContent(batch.sourceId, batch.dataset, batch.format, records)
    return { batch, records, tempPath, replaces }
  }

  private async stageContent(
    sourceId: string,
    dataset: string,
    format: ExportFormat,
    records: readonly BronzeFields[]
  ): Promise<string> {
    const dir = this.sourceDir(sourceId)
    await mkdir(dir, { recursive: true })

    const tempPath = join(dir, `.${dataset}.${createId()}.tmp`)
    const content = format === 'csv' ? encodeCsv(records) : encodeJsonl(records)

    const handle = await open(tempPath, 'wx')
    try {
      await handle.writeFile(content, 'utf8')
      await handle.sync()
    } finally {
      await handle.close()
    }

    return tempPath
  }

  private async replace(file: StagedFile, previous: RunFile): Promise<string> {
    await rename(file.tempPath, previous.path)
    return previous.path
  }

  private async commit(file: StagedFile): Promise<string> {
    const { batch } = file
    const dir = this.sourceDir(batch.sourceId)

    for (let sequence = 1; sequence <= MAX_SUFFIX; sequence++) {
      const finalPath = join(dir, buildFileName(batch.sourceId, batch.dataset, batch.exportDate, batch.format, sequence))
      try {
        await link(file.tempPath, finalPath)
        return finalPath
      } catch (error) {
        if (isAlreadyExists(error)) continue
        throw error
      }
    }

    throw new ExportError(`No free file name for ${batch.sourceId}/${batch.dataset}`)
  }

  private async rollback(staged: readonly StagedFile[]): Promise<void> {
    for (const file of staged) {
      await this.remove(file.tempPath)
      if (!file.finalPath) continue
      if (file.replaces) {
        await this.restore(file.batch.sourceId, file.replaces)
      } else {
        await this.remove(file.finalPath)
      }
    }
  }

  /** Put back what a run file held before a failed append. */
  private async restore(sourceId: string, previous: RunFile): Promise<void> {
    try {
      const tempPath = await this.stageContent(sourceId, previous.dataset, previous.format, previous.records)
      await rename(tempPath, previous.path)
    } catch (error) {
      this.log.error('Could not restore export file', { path: previous.path }, error)
    }
  }

  private async remove(path: string): Promise<void> {
    try {
      await unlink(path)
    } catch (error) {
      if (!isNotFound(error)) {
        this.log.warn('Could not remove file', { path }, error)
      }
    }
  }
}

/**
 * Run-scoped writer. Units are written one at a time; the first unit for a
 * dataset and date creates the file and later units append to it.
 */
export class ExportSession {
  private readonly sink: ExportSink
  private readonly files: RunFiles = new Map()
  private readonly lock = new Mutex()

  constructor(sink: ExportSink) {
    this.sink = sink
  }

  writeUnit(batches: readonly ExportBatch[]): Promise<ExportedFile[]> {
    return this.lock.runExclusive(() => this.sink.writeUnit(batches, this.files))
  }

  /** One entry per file the run wrote, with its total record count. */
  exportedFiles(): ExportedFile[] {
    return [...this.files.values()].map(file => ({
      path: file.path,
      dataset: file.dataset,
      format: file.format,
      records: file.records.length,
    }))
  }
}

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined
}

function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT'
}

function isAlreadyExists(error: unknown): boolean {
  return errorCode(error) === 'EEXIST'
}
