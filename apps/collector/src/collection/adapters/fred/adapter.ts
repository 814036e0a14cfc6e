/**
 * FRED Adapter
 *
 * Federal Reserve Economic Data observations API.
 * One unit per series; incremental from the day after each series'
 * watermark. FRED reports missing observations as "." which are dropped.
 */

import { ConfigError, ParseError } from '../../errors.js'
import type {
  CollectionUnit,
  Cursor,
  DroppedRow,
  NormalizedRecord,
  SourceAdapter,
} from '../../types.js'
import { toIsoDate, resumeFrom } from '../../utils/dates.js'
import { coerceNumber, isRecord, stringOrNull } from '../../utils/fields.js'
import { maxCursor } from '../../process/watermark.js'
import { FRED_SERIES, type FredSeries } from './series.js'

export const FRED_BASE_URL = 'https://api.stlouisfed.org/fred'

export interface FredAdapterOptions {
  apiKey?: string
  series?: readonly FredSeries[]
  baseUrl?: string
}

export type FredUnit = CollectionUnit<FredSeries>

export function buildObservationsUrl(
  baseUrl: string,
  apiKey: string,
  seriesId: string,
  start: Date,
  end: Date
): string {
  const params = new URLSearchParams({
    series_id: seriesId,
    api_key: apiKey,
    file_type: 'json',
    observation_start: toIsoDate(start),
    observation_end: toIsoDate(end),
  })
  return `${baseUrl}/series/observations?${params.toString()}`
}

export function createFredAdapter(options: FredAdapterOptions = {}): SourceAdapter<unknown, FredSeries> {
  const baseUrl = options.baseUrl ?? FRED_BASE_URL
  const series = options.series ?? FRED_SERIES

  const requireKey = (): string => {
    if (!options.apiKey) {
      throw new ConfigError('FRED_API_KEY is not set')
    }
    return options.apiKey
  }

  return {
    manifest: {
      id: 'fred',
      name: 'Federal Reserve Economic Data',
      version: '1.0.0',
      exportFormat: 'csv',
      baseUrls: [baseUrl],
      supportsIncremental: true,
      watermarkPolicy: 'max',
      defaultLookbackDays: 730,
      politeness: { minIntervalMs: 500, jitter: { minMs: 0, maxMs: 100 } },
      maxConcurrency: 1,
    },

    async *enumerateUnits(ctx) {
      requireKey()
      for (const item of series) {
        const start = ctx.incremental ? resumeFrom(ctx.range.start, ctx.watermarks.get(item.dataset)) : ctx.range.start
        if (start.getTime() > ctx.range.end.getTime()) {
          ctx.logger.info('Series up to date', { seriesId: item.seriesId, dataset: item.dataset })
          continue
        }

        const unit: FredUnit = {
          sourceId: 'fred',
          key: `${item.seriesId}:${toIsoDate(start)}:${toIsoDate(ctx.range.end)}`,
          dataset: item.dataset,
          range: { start, end: ctx.range.end },
          meta: item,
        }
        yield unit
      }
    },

    async fetch(unit, ctx) {
      const range = unit.range ?? { start: ctx.collectedAt, end: ctx.collectedAt }
      const url = buildObservationsUrl(baseUrl, requireKey(), unit.meta.seriesId, range.start, range.end)
      return ctx.http.getJson(url, { signal: ctx.signal })
    },

    normalize(payload, unit, ctx) {
      const observations: unknown = isRecord(payload) ? payload.observations : undefined
      if (!Array.isArray(observations)) {
        throw new ParseError(`FRED response for ${unit.meta.seriesId} has no observations array`)
      }
      const rows: unknown[] = observations

      const records: NormalizedRecord[] = []
      const dropped: DroppedRow[] = []
      const collectedAt = ctx.collectedAt.toISOString()

      for (const observation of rows) {
        if (!isRecord(observation)) {
          dropped.push({ reason: 'MISSING_REQUIRED_FIELD', detail: `${unit.meta.seriesId}: observation is not an object` })
          continue
        }

        const date = stringOrNull(observation.date)
        if (!date) {
          dropped.push({ reason: 'MISSING_REQUIRED_FIELD', detail: `${unit.meta.seriesId}: observation without date` })
          continue
        }

        const value = coerceNumber(observation.value)
        if (value === null) {
          dropped.push({
            reason: 'NUMERIC_COERCION_FAILED',
            detail: `${unit.meta.seriesId} ${date}: value ${JSON.stringify(observation.value)}`,
          })
          continue
        }

        records.push({
          dataset: unit.dataset,
          fields: {
            source: 'fred',
            timestamp_collected: collectedAt,
            series_id: unit.meta.seriesId,
            date,
            value,
            realtime_start: stringOrNull(observation.realtime_start),
            realtime_end: stringOrNull(observation.realtime_end),
          },
        })
      }

      return { records, dropped }
    },

    async healthCheck(ctx) {
      if (!options.apiKey) {
        ctx.logger.error('FRED_API_KEY is not set')
        return false
      }
      const params = new URLSearchParams({ series_id: 'DFF', api_key: options.apiKey, file_type: 'json' })
      const result = await ctx.http.getJson(`${baseUrl}/series?${params.toString()}`, { signal: ctx.signal })
      return result.ok
    },

    watermarkCursor(_unit, records) {
      let cursor: Cursor | undefined
      for (const record of records) {
        const date = record.fields.date
        if (typeof date === 'string') cursor = maxCursor(cursor, date)
      }
      return cursor
    },
  }
}
