import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { writeRunManifest } from '../process/run-manifest.js'
import type { ManifestEntry, RunReport } from '../types.js'
import { summarizeResults } from '../metrics.js'

function report(manifest: ManifestEntry[]): RunReport {
  return {
    runId: 'run-1',
    sourceId: 'ecb',
    mode: 'incremental',
    range: { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-01-02T00:00:00Z') },
    startedAt: new Date('2024-01-03T10:00:00Z'),
    finishedAt: new Date('2024-01-03T10:01:00Z'),
    durationMs: 60000,
    state: 'Idle',
    cancelled: false,
    results: [],
    files: [],
    manifest,
    watermarks: [],
    metrics: summarizeResults({ results: [], files: [] }, 0),
  }
}

describe('writeRunManifest', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'manifest-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes nothing when every unit succeeded', async () => {
    expect(await writeRunManifest(dir, report([]))).toBeNull()
    expect(await readdir(dir)).toEqual([])
  })

  it('writes failed units under the source directory', async () => {
    const entry: ManifestEntry = {
      unitKey: 'EXR:D.USD.EUR.SP00.A',
      dataset: 'EXR',
      status: 'failed',
      errorKind: 'TerminalRequestError',
      message: 'HTTP 404: Not Found',
      attempts: 1,
    }

    const path = await writeRunManifest(dir, report([entry]))

    expect(path).toBe(join(dir, 'ecb', 'run-1.json'))
    const document: unknown = JSON.parse(await readFile(join(dir, 'ecb', 'run-1.json'), 'utf8'))
    expect(document).toEqual({
      runId: 'run-1',
      sourceId: 'ecb',
      mode: 'incremental',
      state: 'Idle',
      range: { start: '2024-01-01T00:00:00.000Z', end: '2024-01-02T00:00:00.000Z' },
      startedAt: '2024-01-03T10:00:00.000Z',
      finishedAt: '2024-01-03T10:01:00.000Z',
      entries: [entry],
    })
    expect(await readdir(join(dir, 'ecb'))).toEqual(['run-1.json'])
  })
})
