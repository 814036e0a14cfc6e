import { loggers } from '../../config/logger.js'
import { CollectionError, TotalSourceUnavailableError } from '../../collection/errors.js'
import {
  fail,
  ok,
  type AnySourceAdapter,
  type DateRange,
  type Result,
  type RunReport,
} from '../../collection/types.js'
import { addDays, parseIsoDate, startOfUtcDay, toIsoDate } from '../../collection/utils/dates.js'
import type { CollectorRuntime } from '../runtime.js'
import { resolveSources } from './resolve-sources.js'

export interface CollectCommandArgs {
  sourceId: string
  start: string
  end: string
  full: boolean
  /** Overrides RUN_DEADLINE_MS */
  deadlineMs?: number
}

const log = loggers.cli

/**
 * Requested range; the start defaults to the adapter's lookback window
 * ending at `end` (default: today, UTC).
 */
export function resolveRange(
  args: Pick<CollectCommandArgs, 'start' | 'end'>,
  lookbackDays: number,
  today: Date
): Result<DateRange, string> {
  const end = args.end ? parseIsoDate(args.end) : startOfUtcDay(today)
  if (!end) return fail(`Invalid --end '${args.end}', expected YYYY-MM-DD`)

  const start = args.start ? parseIsoDate(args.start) : addDays(end, -lookbackDays)
  if (!start) return fail(`Invalid --start '${args.start}', expected YYYY-MM-DD`)

  if (start.getTime() > end.getTime()) {
    return fail(`--start ${toIsoDate(start)} is after --end ${toIsoDate(end)}`)
  }
  return ok({ start, end })
}

export function formatReport(report: RunReport): string[] {
  const m = report.metrics
  const lines = [
    `${report.sourceId}: ${report.state}${report.cancelled ? ' (cancelled)' : ''} run=${report.runId} ` +
      `units=${m.unitsAttempted} succeeded=${m.unitsSucceeded} failed=${m.unitsFailed} ` +
      `skipped=${m.unitsSkipped} records=${m.recordsExported} files=${m.filesExported}`,
  ]
  for (const file of report.files) {
    lines.push(`  wrote ${file.path} (${file.records} records)`)
  }
  for (const entry of report.manifest) {
    lines.push(`  ${entry.status} ${entry.unitKey}: ${entry.errorKind ?? ''} ${entry.message}`.trimEnd())
  }
  for (const advance of report.watermarks) {
    lines.push(`  watermark ${advance.dataset}: ${advance.previous ?? '-'} -> ${advance.next}`)
  }
  return lines
}

async function collectOne(
  adapter: AnySourceAdapter,
  args: CollectCommandArgs,
  runtime: Pick<CollectorRuntime, 'orchestrator' | 'settings'>,
  today: Date
): Promise<number> {
  const range = resolveRange(args, adapter.manifest.defaultLookbackDays, today)
  if (!range.ok) {
    console.error(range.error)
    return 2
  }

  try {
    const report = await runtime.orchestrator.run(adapter, {
      range: range.value,
      mode: args.full ? 'full' : 'incremental',
      deadlineMs: args.deadlineMs ?? runtime.settings.runDeadlineMs,
    })
    for (const line of formatReport(report)) console.log(line)
    return 0
  } catch (error) {
    if (error instanceof TotalSourceUnavailableError) {
      console.error(`${adapter.manifest.id}: source unavailable: ${error.message}`)
      if (error.report) {
        for (const line of formatReport(error.report)) console.error(line)
      }
      return 1
    }
    if (error instanceof CollectionError) {
      console.error(`${adapter.manifest.id}: ${error.kind}: ${error.message}`)
      return 1
    }
    throw error
  }
}

export async function runCollectCommand(
  args: CollectCommandArgs,
  runtime: Pick<CollectorRuntime, 'registry' | 'orchestrator' | 'settings'>,
  today: Date = new Date()
): Promise<number> {
  const sources = resolveSources(runtime.registry, args.sourceId)
  if (!sources.ok) {
    console.error(sources.error)
    return 2
  }

  let exitCode = 0
  for (const adapter of sources.value) {
    const code = await collectOne(adapter, args, runtime, today)
    log.debug('Source finished', { sourceId: adapter.manifest.id, exitCode: code })
    exitCode = Math.max(exitCode, code)
  }
  return exitCode
}
