/**
 * UTC calendar-date helpers. Ranges are inclusive and day-granular.
 */

const DAY_MS = 24 * 60 * 60 * 1000
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

/** YYYY-MM-DD in UTC */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10)
}

/** YYYYMMDD in UTC */
export function toDateStamp(date: Date): string {
  return toIsoDate(date).replace(/-/g, '')
}

/**
 * Parse a strict YYYY-MM-DD string as UTC midnight.
 * Returns null for anything else, including impossible dates.
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value.trim())
  if (!match) return null
  const [, y, m, d] = match
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)))
  return toIsoDate(date) === value.trim() ? date : null
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()))
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS)
}

/**
 * Every UTC day from start to end, both inclusive.
 */
export function eachDay(start: Date, end: Date): Date[] {
  const days: Date[] = []
  const last = startOfUtcDay(end).getTime()
  for (let day = startOfUtcDay(start); day.getTime() <= last; day = addDays(day, 1)) {
    days.push(day)
  }
  return days
}

/**
 * Start of an incremental window: the day after the watermark, or the
 * requested start when that is later.
 */
export function resumeFrom(requestedStart: Date, watermark: string | undefined): Date {
  if (!watermark) return startOfUtcDay(requestedStart)
  const parsed = Date.parse(watermark)
  if (!Number.isFinite(parsed)) return startOfUtcDay(requestedStart)
  const next = addDays(startOfUtcDay(new Date(parsed)), 1)
  return next.getTime() > requestedStart.getTime() ? next : startOfUtcDay(requestedStart)
}
