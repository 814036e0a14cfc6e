import { vi, type MockInstance } from 'vitest'
import { loggers } from '../../../config/logger.js'
import { HttpFetcher } from '../../fetch/http-fetcher.js'
import { CostGuard } from '../../process/cost-guard.js'
import type {
  AdapterContext,
  Cursor,
  DateRange,
  EnumerationContext,
  FetchContext,
  HealthCheckContext,
} from '../../types.js'

export const COLLECTED_AT = new Date('2024-04-01T12:00:00.000Z')

export function adapterContext(sourceId: string): AdapterContext {
  return {
    sourceId,
    runId: 'run-test',
    collectedAt: COLLECTED_AT,
    logger: loggers.adapters.child(sourceId),
  }
}

export function fetchContext(
  sourceId: string,
  options: { http?: HttpFetcher; costLimit?: number } = {}
): FetchContext {
  return {
    ...adapterContext(sourceId),
    http: options.http ?? new HttpFetcher(),
    costGuard: new CostGuard({ limit: options.costLimit ?? Number.MAX_SAFE_INTEGER }),
    signal: new AbortController().signal,
    attempt: 1,
  }
}

export function healthContext(sourceId: string, http: HttpFetcher = new HttpFetcher()): HealthCheckContext {
  return { ...adapterContext(sourceId), http, signal: new AbortController().signal }
}

/**
 * Enumeration context whose discover() runs the operation once, without
 * pacing or retry.
 */
export function enumerationContext(
  sourceId: string,
  range: DateRange,
  options: { incremental?: boolean; watermarks?: Record<string, Cursor>; http?: HttpFetcher } = {}
): EnumerationContext {
  const watermarks = options.watermarks ?? {}
  const fetchCtx = fetchContext(sourceId, { http: options.http })
  return {
    ...adapterContext(sourceId),
    range,
    incremental: options.incremental ?? false,
    watermarks: { get: dataset => watermarks[dataset] },
    signal: new AbortController().signal,
    discover: (_key, op) => op(fetchCtx),
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of iterable) items.push(item)
  return items
}

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
}

export interface StubResponse {
  status?: number
  body: string
  headers?: Record<string, string>
}

/**
 * Replace global fetch with a router. Requests it does not answer get a 404.
 */
export function stubFetch(
  route: (url: string, init: RequestInit | undefined) => StubResponse | undefined
): MockInstance<typeof fetch> {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
    const answer = route(url, init)
    if (!answer) {
      return new Response('not found', { status: 404, statusText: 'Not Found' })
    }
    const status = answer.status ?? 200
    return new Response(answer.body, {
      status,
      statusText: STATUS_TEXT[status] ?? 'Error',
      headers: answer.headers,
    })
  })
}

export function requestedUrls(mock: MockInstance<typeof fetch>): string[] {
  return mock.mock.calls.map(([input]) =>
    typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
  )
}
