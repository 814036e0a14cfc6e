/**
 * BigQuery REST client
 *
 * Minimal jobs.query / getQueryResults wrapper over the adapter's
 * HttpFetcher, so every call is paced and retried by the framework.
 * Rows come back as column name -> string (or null), decoded from the
 * f/v cell encoding using the response schema.
 */

import { ParseError, RetryableNetworkError } from '../../errors.js'
import type { HttpFetcher } from '../../fetch/http-fetcher.js'
import { fail, ok, type Result } from '../../types.js'
import { isRecord, stringOrNull } from '../../utils/fields.js'

export const BIGQUERY_BASE_URL = 'https://bigquery.googleapis.com/bigquery/v2'

/** Server-side wait per jobs.query / getQueryResults call */
const SERVER_WAIT_MS = 10000
const MAX_POLLS = 6
const MAX_PAGES = 200

export interface BigQueryConfig {
  projectId: string
  accessToken: string
  baseUrl?: string
}

export interface QueryParameter {
  name: string
  type: 'DATE' | 'STRING' | 'INT64'
  value: string
}

export type BigQueryRow = Record<string, string | null>

interface QueryPage {
  jobComplete: boolean
  jobId?: string
  location?: string
  pageToken?: string
  totalBytesProcessed?: number
  rows: BigQueryRow[]
}

function queriesUrl(config: BigQueryConfig): string {
  const base = config.baseUrl ?? BIGQUERY_BASE_URL
  return `${base}/projects/${encodeURIComponent(config.projectId)}/queries`
}

function authHeaders(config: BigQueryConfig): Record<string, string> {
  return { Authorization: `Bearer ${config.accessToken}` }
}

function queryBody(query: string, parameters: readonly QueryParameter[], dryRun: boolean): Record<string, unknown> {
  return {
    query,
    useLegacySql: false,
    useQueryCache: false,
    dryRun,
    timeoutMs: SERVER_WAIT_MS,
    parameterMode: 'NAMED',
    queryParameters: parameters.map(p => ({
      name: p.name,
      parameterType: { type: p.type },
      parameterValue: { value: p.value },
    })),
  }
}

/**
 * Decode a jobs.query or getQueryResults response body.
 */
export function parseQueryPage(payload: unknown): QueryPage {
  if (!isRecord(payload)) {
    throw new ParseError('BigQuery response is not an object')
  }

  const jobReference = isRecord(payload.jobReference) ? payload.jobReference : {}
  const schema = isRecord(payload.schema) ? payload.schema : {}
  const schemaFields: unknown[] = Array.isArray(schema.fields) ? schema.fields : []
  const columns = schemaFields.map(field => (isRecord(field) ? stringOrNull(field.name) : null))

  const rawRows: unknown[] = Array.isArray(payload.rows) ? payload.rows : []
  if (rawRows.length > 0 && columns.length === 0) {
    throw new ParseError('BigQuery response has rows but no schema')
  }

  const rows = rawRows.map((raw, index) => {
    const cells: unknown[] = isRecord(raw) && Array.isArray(raw.f) ? raw.f : []
    if (cells.length !== columns.length) {
      throw new ParseError(`BigQuery row ${index} has ${cells.length} cells, expected ${columns.length}`)
    }
    const row: BigQueryRow = {}
    cells.forEach((cell, i) => {
      const column = columns[i]
      if (column) row[column] = isRecord(cell) ? stringOrNull(cell.v) : null
    })
    return row
  })

  const bytes = stringOrNull(payload.totalBytesProcessed)
  const totalBytesProcessed = bytes !== null && /^\d+$/.test(bytes) ? Number(bytes) : undefined

  return {
    jobComplete: payload.jobComplete !== false,
    jobId: stringOrNull(jobReference.jobId) ?? undefined,
    location: stringOrNull(jobReference.location) ?? undefined,
    pageToken: stringOrNull(payload.pageToken) ?? undefined,
    totalBytesProcessed,
    rows,
  }
}

function decode(payload: unknown): Result<QueryPage> {
  try {
    return ok(parseQueryPage(payload))
  } catch (error) {
    return fail(error instanceof ParseError ? error : new ParseError('BigQuery response could not be read', { cause: error }))
  }
}

/**
 * Bytes the query would scan, from a dry run.
 */
export async function estimateQueryBytes(
  http: HttpFetcher,
  config: BigQueryConfig,
  query: string,
  parameters: readonly QueryParameter[],
  signal?: AbortSignal
): Promise<Result<number>> {
  const response = await http.postJson(queriesUrl(config), queryBody(query, parameters, true), {
    headers: authHeaders(config),
    signal,
  })
  if (!response.ok) return response

  const page = decode(response.value)
  if (!page.ok) return page
  if (page.value.totalBytesProcessed === undefined) {
    return fail(new ParseError('Dry run response has no totalBytesProcessed'))
  }
  return ok(page.value.totalBytesProcessed)
}

/**
 * Run a query and collect every result page.
 * A job still running after the poll budget is a retryable failure.
 */
export async function runQuery(
  http: HttpFetcher,
  config: BigQueryConfig,
  query: string,
  parameters: readonly QueryParameter[],
  signal?: AbortSignal
): Promise<Result<BigQueryRow[]>> {
  const response = await http.postJson(queriesUrl(config), queryBody(query, parameters, false), {
    headers: authHeaders(config),
    signal,
  })
  if (!response.ok) return response

  const first = decode(response.value)
  if (!first.ok) return first
  let current = first.value

  const rows: BigQueryRow[] = []
  let polls = 0
  let pages = 0

  while (true) {
    if (!current.jobComplete) {
      if (++polls > MAX_POLLS) {
        return fail(new RetryableNetworkError(`BigQuery job ${current.jobId ?? '?'} did not complete`))
      }
    } else {
      rows.push(...current.rows)
      if (!current.pageToken) return ok(rows)
      if (++pages > MAX_PAGES) {
        return fail(new ParseError(`BigQuery result exceeded ${MAX_PAGES} pages`))
      }
    }

    if (!current.jobId) {
      return fail(new ParseError('BigQuery response has no job reference'))
    }

    const params = new URLSearchParams({ timeoutMs: String(SERVER_WAIT_MS) })
    if (current.jobComplete && current.pageToken) params.set('pageToken', current.pageToken)
    if (current.location) params.set('location', current.location)

    const next = await http.getJson(`${queriesUrl(config)}/${encodeURIComponent(current.jobId)}?${params.toString()}`, {
      headers: authHeaders(config),
      signal,
    })
    if (!next.ok) return next

    const decoded = decode(next.value)
    if (!decoded.ok) return decoded
    current = decoded.value
  }
}
