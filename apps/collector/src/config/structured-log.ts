/**
 * Structured logging helpers for collection runs.
 *
 * Enforces common envelope fields (run, source, stage, unit, attempt)
 * so every line emitted during a run can be correlated.
 */

import { createHash } from 'node:crypto'
import type { ILogger, LogContext } from '@macro-ingest/logger'

export type RunLogContext = {
  runId?: string
  sourceId?: string
  stage?: string
  unitKey?: string
  dataset?: string
  attempt?: number
  [key: string]: unknown
}

export function createRunLogger(base: ILogger, context: RunLogContext): ILogger {
  const baseContext = compact(context)

  const withEnvelope = (event: string, meta?: LogContext): LogContext => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, withEnvelope(event, meta)),
    info: (event, meta) => base.info(event, withEnvelope(event, meta)),
    warn: (event, meta, err) => base.warn(event, withEnvelope(event, meta), err),
    error: (event, meta, err) => base.error(event, withEnvelope(event, meta), err),
    fatal: (event, meta, err) => base.fatal(event, withEnvelope(event, meta), err),
    child: (componentOrContext, defaultContext) => {
      if (typeof componentOrContext === 'string') {
        return createRunLogger(base.child(componentOrContext), { ...baseContext, ...defaultContext })
      }
      return createRunLogger(base, { ...baseContext, ...componentOrContext })
    },
  }
}

/**
 * Host and path of a URL plus a short hash, for log lines that must not
 * carry query strings.
 */
export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
