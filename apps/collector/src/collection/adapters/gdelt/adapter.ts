/**
 * GDELT Adapter
 *
 * Currency and central-bank news from the GDELT Global Knowledge Graph,
 * queried through BigQuery. One unit per partition day. Each unit dry-runs
 * its query and only executes it when the scanned bytes are within the
 * cost limit. Days advance the watermark contiguously, so a failed day is
 * retried by the next incremental run.
 */

import { ConfigError } from '../../errors.js'
import type { CollectionUnit, DroppedRow, NormalizedRecord, SourceAdapter } from '../../types.js'
import { eachDay, resumeFrom, toIsoDate } from '../../utils/dates.js'
import { computeFingerprint } from '../../utils/fingerprint.js'
import { estimateQueryBytes, runQuery, type BigQueryConfig, type BigQueryRow, type QueryParameter } from './bigquery.js'

export const GKG_DATASET = 'gkg'

export const GKG_QUERY = `
SELECT
  DATE,
  SourceCommonName,
  DocumentIdentifier,
  V2Tone,
  V2Themes AS Themes,
  V2Locations AS Locations,
  V2Organizations AS Organizations
FROM \`gdelt-bq.gdeltv2.gkg_partitioned\`
WHERE DATE(_PARTITIONTIME) >= @start
  AND DATE(_PARTITIONTIME) < @end
  AND (V2Themes LIKE '%ECON_CURRENCY%' OR V2Themes LIKE '%ECON_CENTRAL_BANK%')
  AND (V2Themes LIKE '%EUR%' OR V2Themes LIKE '%USD%' OR V2Themes LIKE '%GBP%' OR V2Themes LIKE '%JPY%')
`.trim()

const TIER_1 = ['reuters.com', 'bloomberg.com', 'ft.com']
const TIER_2 = ['wsj.com', 'cnbc.com']

export interface GdeltAdapterOptions {
  projectId?: string
  accessToken?: string
  /** Bytes a single day's query may scan; defaults to the Cost Guard's limit */
  costLimitBytes?: number
  baseUrl?: string
}

export interface GdeltUnitMeta {
  /** Partition day, YYYY-MM-DD */
  day: string
}

export type GdeltUnit = CollectionUnit<GdeltUnitMeta>

export function credibilityTier(domain: string | null): 1 | 2 | 3 {
  const value = (domain ?? '').toLowerCase()
  if (TIER_1.some(d => value.includes(d))) return 1
  if (TIER_2.some(d => value.includes(d))) return 2
  return 3
}

/**
 * Split a GKG delimited list ("a;b;;c") into trimmed, non-empty items.
 */
export function splitGkgList(value: string | null): string[] {
  if (!value) return []
  return value
    .split(';')
    .map(item => item.trim())
    .filter(item => item.length > 0)
}

/**
 * GKG DATE is YYYYMMDDHHMMSS in UTC.
 */
export function parseGkgDate(value: string | null): string | null {
  if (!value) return null
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(value.trim())
  if (!match) return null
  const [, y, mo, d, h, mi, s] = match
  return `${y}-${mo}-${d}T${h}:${mi}:${s}.000Z`
}

function dayParameters(day: string): QueryParameter[] {
  const next = new Date(Date.parse(`${day}T00:00:00.000Z`) + 24 * 60 * 60 * 1000)
  return [
    { name: 'start', type: 'DATE', value: day },
    { name: 'end', type: 'DATE', value: toIsoDate(next) },
  ]
}

export function createGdeltAdapter(options: GdeltAdapterOptions = {}): SourceAdapter<BigQueryRow[], GdeltUnitMeta> {
  const requireConfig = (): BigQueryConfig => {
    if (!options.projectId || !options.accessToken) {
      throw new ConfigError('BIGQUERY_PROJECT_ID and BIGQUERY_ACCESS_TOKEN must be set')
    }
    return { projectId: options.projectId, accessToken: options.accessToken, baseUrl: options.baseUrl }
  }

  return {
    manifest: {
      id: 'gdelt',
      name: 'GDELT Global Knowledge Graph',
      version: '1.0.0',
      exportFormat: 'jsonl',
      baseUrls: ['https://bigquery.googleapis.com'],
      supportsIncremental: true,
      watermarkPolicy: 'contiguous',
      defaultLookbackDays: 7,
      politeness: { minIntervalMs: 1000, jitter: { minMs: 0, maxMs: 250 } },
      maxConcurrency: 2,
      retryPolicy: { maxAttempts: 4 },
    },

    async *enumerateUnits(ctx) {
      requireConfig()
      const start = ctx.incremental ? resumeFrom(ctx.range.start, ctx.watermarks.get(GKG_DATASET)) : ctx.range.start

      for (const day of eachDay(start, ctx.range.end)) {
        const iso = toIsoDate(day)
        const unit: GdeltUnit = {
          sourceId: 'gdelt',
          key: `${GKG_DATASET}:${iso}`,
          dataset: GKG_DATASET,
          range: { start: day, end: day },
          exportDate: day,
          meta: { day: iso },
        }
        yield unit
      }
    },

    async fetch(unit, ctx) {
      const config = requireConfig()
      const parameters = dayParameters(unit.meta.day)

      return ctx.costGuard.guarded(
        async () => {
          const estimate = await estimateQueryBytes(ctx.http, config, GKG_QUERY, parameters, ctx.signal)
          if (estimate.ok) {
            ctx.logger.info('Dry run estimate', { day: unit.meta.day, bytes: estimate.value })
          }
          return estimate
        },
        () => runQuery(ctx.http, config, GKG_QUERY, parameters, ctx.signal),
        options.costLimitBytes
      )
    },

    normalize(rows, unit, ctx) {
      const records: NormalizedRecord[] = []
      const dropped: DroppedRow[] = []
      const collectedAt = ctx.collectedAt.toISOString()

      for (const row of rows) {
        const url = row.DocumentIdentifier?.trim()
        if (!url) {
          dropped.push({ reason: 'MISSING_REQUIRED_FIELD', detail: `${unit.meta.day}: row without DocumentIdentifier` })
          continue
        }

        const fingerprint = computeFingerprint('gdelt', url)
        const domain = row.SourceCommonName ?? null

        records.push({
          dataset: GKG_DATASET,
          fingerprint,
          fields: {
            source: 'gdelt',
            timestamp_collected: collectedAt,
            timestamp_published: parseGkgDate(row.DATE ?? null),
            url,
            source_domain: domain,
            tone: row.V2Tone ?? null,
            themes: splitGkgList(row.Themes ?? null),
            locations: splitGkgList(row.Locations ?? null),
            organizations: splitGkgList(row.Organizations ?? null),
            metadata: {
              credibility_tier: credibilityTier(domain),
              url_hash: fingerprint,
            },
          },
        })
      }

      return { records, dropped }
    },

    async healthCheck(ctx) {
      if (!options.projectId || !options.accessToken) {
        ctx.logger.error('BigQuery credentials are not set')
        return false
      }
      const result = await estimateQueryBytes(ctx.http, requireConfig(), 'SELECT 1', [], ctx.signal)
      return result.ok
    },

    watermarkCursor(unit) {
      return unit.meta.day
    },
  }
}
