/**
 * Run manifest persistence.
 *
 * Units that did not succeed are written to
 * {manifestDir}/{source}/{runId}.json so they can be retried or inspected.
 */

import { mkdir, rename, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ManifestEntry, RunReport } from '../types.js'

export interface RunManifestDocument {
  runId: string
  sourceId: string
  mode: RunReport['mode']
  state: RunReport['state']
  range: { start: string; end: string }
  startedAt: string
  finishedAt: string
  entries: ManifestEntry[]
}

export async function writeRunManifest(manifestDir: string, report: RunReport): Promise<string | null> {
  if (report.manifest.length === 0) return null

  const document: RunManifestDocument = {
    runId: report.runId,
    sourceId: report.sourceId,
    mode: report.mode,
    state: report.state,
    range: { start: report.range.start.toISOString(), end: report.range.end.toISOString() },
    startedAt: report.startedAt.toISOString(),
    finishedAt: report.finishedAt.toISOString(),
    entries: report.manifest,
  }

  const dir = join(manifestDir, report.sourceId)
  await mkdir(dir, { recursive: true })
  const path = join(dir, `${report.runId}.json`)
  const tempPath = `${path}.tmp`
  await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8')
  await rename(tempPath, path)
  return path
}
