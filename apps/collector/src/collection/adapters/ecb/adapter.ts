/**
 * ECB Adapter
 *
 * ECB Data Portal SDMX REST API, CSV format. One unit per dataset.
 * All columns are kept; OBS_VALUE is coerced to a number and rows
 * without one are dropped.
 */

import { parse } from 'csv-parse/sync'
import { ParseError } from '../../errors.js'
import { maxCursor } from '../../process/watermark.js'
import type { CollectionUnit, Cursor, DroppedRow, NormalizedRecord, SourceAdapter } from '../../types.js'
import { resumeFrom, toIsoDate } from '../../utils/dates.js'
import { coerceNumber, isRecord, toSnakeCase } from '../../utils/fields.js'
import { ECB_DATASETS, type EcbDataset } from './datasets.js'

export const ECB_BASE_URL = 'https://data-api.ecb.europa.eu/service'

export interface EcbAdapterOptions {
  baseUrl?: string
  datasets?: readonly EcbDataset[]
}

export type EcbUnit = CollectionUnit<EcbDataset>

export function buildDataUrl(baseUrl: string, dataset: EcbDataset, start?: Date, end?: Date): string {
  const params = new URLSearchParams({ format: 'csvdata' })
  if (start) params.set('startPeriod', toIsoDate(start))
  if (end) params.set('endPeriod', toIsoDate(end))
  return `${baseUrl}/data/${dataset.flow}/${dataset.key}?${params.toString()}`
}

/**
 * Parse SDMX CSV into row objects. All values stay strings.
 *
 * @throws ParseError when the body is not CSV with a header row
 */
export function parseSdmxCsv(body: string): Record<string, string>[] {
  if (body.trim() === '') return []

  let parsed: unknown
  try {
    parsed = parse(body, { columns: true, skip_empty_lines: true, bom: true, trim: true })
  } catch (error) {
    throw new ParseError('ECB response is not valid CSV', { cause: error })
  }

  if (!Array.isArray(parsed)) {
    throw new ParseError('ECB response did not parse into rows')
  }

  const parsedRows: unknown[] = parsed
  const rows: Record<string, string>[] = []
  for (const row of parsedRows) {
    if (!isRecord(row)) continue
    const values: Record<string, string> = {}
    for (const [key, value] of Object.entries(row)) {
      values[key] = typeof value === 'string' ? value : String(value ?? '')
    }
    rows.push(values)
  }
  return rows
}

export function createEcbAdapter(options: EcbAdapterOptions = {}): SourceAdapter<string, EcbDataset> {
  const baseUrl = options.baseUrl ?? ECB_BASE_URL
  const datasets = options.datasets ?? ECB_DATASETS

  return {
    manifest: {
      id: 'ecb',
      name: 'European Central Bank Data Portal',
      version: '1.0.0',
      exportFormat: 'csv',
      baseUrls: [baseUrl],
      supportsIncremental: true,
      fullRefreshDatasets: datasets.filter(dataset => dataset.fullRefresh).map(dataset => dataset.dataset),
      watermarkPolicy: 'max',
      defaultLookbackDays: 730,
      politeness: { minIntervalMs: 1000, jitter: { minMs: 0, maxMs: 250 } },
      maxConcurrency: 1,
    },

    async *enumerateUnits(ctx) {
      for (const dataset of datasets) {
        const start =
          ctx.incremental && !dataset.fullRefresh
            ? resumeFrom(ctx.range.start, ctx.watermarks.get(dataset.dataset))
            : ctx.range.start

        if (start.getTime() > ctx.range.end.getTime()) {
          ctx.logger.info('Dataset up to date', { dataset: dataset.dataset })
          continue
        }

        const unit: EcbUnit = {
          sourceId: 'ecb',
          key: `${dataset.flow}:${dataset.dataset}:${toIsoDate(start)}:${toIsoDate(ctx.range.end)}`,
          dataset: dataset.dataset,
          range: { start, end: ctx.range.end },
          meta: dataset,
        }
        yield unit
      }
    },

    async fetch(unit, ctx) {
      const url = buildDataUrl(baseUrl, unit.meta, unit.range?.start, unit.range?.end)
      return ctx.http.getText(url, { signal: ctx.signal, headers: { Accept: 'text/csv' } })
    },

    normalize(payload, unit, ctx) {
      const rows = parseSdmxCsv(payload)
      const records: NormalizedRecord[] = []
      const dropped: DroppedRow[] = []
      const collectedAt = ctx.collectedAt.toISOString()

      for (const row of rows) {
        const value = coerceNumber(row.OBS_VALUE)
        if (value === null) {
          dropped.push({
            reason: 'NUMERIC_COERCION_FAILED',
            detail: `${row.KEY ?? unit.meta.flow} ${row.TIME_PERIOD ?? '?'}: OBS_VALUE ${JSON.stringify(row.OBS_VALUE ?? null)}`,
          })
          continue
        }

        const fields: NormalizedRecord['fields'] = { source: 'ecb', timestamp_collected: collectedAt }
        for (const [key, raw] of Object.entries(row)) {
          fields[toSnakeCase(key)] = raw === '' ? null : raw
        }
        fields.obs_value = value

        records.push({ dataset: unit.dataset, fields })
      }

      return { records, dropped }
    },

    async healthCheck(ctx) {
      const params = new URLSearchParams({ format: 'csvdata', lastNObservations: '1' })
      const result = await ctx.http.getText(`${baseUrl}/data/EXR/D.USD.EUR.SP00.A?${params.toString()}`, {
        signal: ctx.signal,
        headers: { Accept: 'text/csv' },
      })
      return result.ok
    },

    watermarkCursor(_unit, records) {
      let cursor: Cursor | undefined
      for (const record of records) {
        const period = record.fields.time_period
        if (typeof period === 'string') cursor = maxCursor(cursor, period)
      }
      return cursor
    },
  }
}
