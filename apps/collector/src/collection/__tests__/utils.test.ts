import { describe, it, expect } from 'vitest'
import { canonicalizeUrl, isValidUrl } from '../utils/url.js'
import { computeFingerprint } from '../utils/fingerprint.js'
import { coerceNumber, stringOrNull, toSnakeCase } from '../utils/fields.js'
import { addDays, eachDay, parseIsoDate, resumeFrom, toDateStamp, toIsoDate } from '../utils/dates.js'
import { Mutex } from '../utils/mutex.js'
import { SequenceGate } from '../utils/sequence-gate.js'

describe('canonicalizeUrl', () => {
  it('upgrades to https, lowercases the host and drops the fragment', () => {
    expect(canonicalizeUrl('http://WWW.FederalReserve.gov/newsevents/speech/powell20240301a.htm#top')).toBe(
      'https://www.federalreserve.gov/newsevents/speech/powell20240301a.htm'
    )
  })

  it('removes tracking and empty parameters and sorts the rest', () => {
    expect(canonicalizeUrl('https://example.com/a/?utm_source=x&b=2&fbclid=y&a=1&empty=')).toBe(
      'https://example.com/a?a=1&b=2'
    )
  })

  it('accepts only http(s) URLs as valid', () => {
    expect(isValidUrl('https://example.com')).toBe(true)
    expect(isValidUrl('ftp://example.com')).toBe(false)
    expect(isValidUrl('not a url')).toBe(false)
  })
})

describe('computeFingerprint', () => {
  it('is stable across URL spellings of the same document', () => {
    expect(computeFingerprint('fed', 'http://www.federalreserve.gov/a.htm?utm_source=rss')).toBe(
      computeFingerprint('fed', 'https://www.federalreserve.gov/a.htm')
    )
  })

  it('is scoped by source', () => {
    expect(computeFingerprint('fed', 'https://example.com/a')).not.toBe(computeFingerprint('ecb', 'https://example.com/a'))
  })

  it('is a sha256 hex digest', () => {
    expect(computeFingerprint('gdelt', 'https://example.com/a')).toMatch(/^[0-9a-f]{64}$/)
  })
})

describe('field helpers', () => {
  it('converts field names to snake_case', () => {
    expect(toSnakeCase('SourceCommonName')).toBe('source_common_name')
    expect(toSnakeCase('OBS_VALUE')).toBe('obs_value')
    expect(toSnakeCase('V2Tone')).toBe('v2_tone')
    expect(toSnakeCase('TIME PERIOD')).toBe('time_period')
  })

  it('coerces only fully numeric text', () => {
    expect(coerceNumber('5.33')).toBe(5.33)
    expect(coerceNumber(' -0.25 ')).toBe(-0.25)
    expect(coerceNumber('1e3')).toBe(1000)
    expect(coerceNumber(4)).toBe(4)
    expect(coerceNumber('.')).toBeNull()
    expect(coerceNumber('')).toBeNull()
    expect(coerceNumber('12abc')).toBeNull()
    expect(coerceNumber(null)).toBeNull()
  })

  it('reads scalars as strings', () => {
    expect(stringOrNull('a')).toBe('a')
    expect(stringOrNull(3)).toBe('3')
    expect(stringOrNull(undefined)).toBeNull()
  })
})

describe('date helpers', () => {
  it('formats UTC dates', () => {
    const date = new Date('2024-03-05T23:30:00.000Z')
    expect(toIsoDate(date)).toBe('2024-03-05')
    expect(toDateStamp(date)).toBe('20240305')
  })

  it('parses only real calendar dates', () => {
    expect(parseIsoDate('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z')
    expect(parseIsoDate('2023-02-29')).toBeNull()
    expect(parseIsoDate('2024/01/01')).toBeNull()
  })

  it('lists every day of a range inclusively', () => {
    const days = eachDay(new Date('2024-01-30T00:00:00Z'), new Date('2024-02-02T00:00:00Z')).map(toIsoDate)
    expect(days).toEqual(['2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02'])
  })

  it('resumes the day after the watermark unless the request starts later', () => {
    const start = new Date('2024-01-01T00:00:00Z')
    expect(toIsoDate(resumeFrom(start, '2024-01-10'))).toBe('2024-01-11')
    expect(toIsoDate(resumeFrom(start, '2023-06-30'))).toBe('2024-01-01')
    expect(toIsoDate(resumeFrom(start, undefined))).toBe('2024-01-01')
    expect(toIsoDate(resumeFrom(start, 'not-a-date'))).toBe('2024-01-01')
  })

  it('adds days', () => {
    expect(toIsoDate(addDays(new Date('2024-12-31T00:00:00Z'), 1))).toBe('2025-01-01')
  })
})

describe('Mutex', () => {
  it('runs callers one at a time in arrival order', async () => {
    const mutex = new Mutex()
    const events: string[] = []
    const task = (name: string, ms: number) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`)
        await new Promise(resolve => setTimeout(resolve, ms))
        events.push(`${name}:end`)
      })

    await Promise.all([task('a', 20), task('b', 0)])

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
  })

  it('releases the lock when a caller throws', async () => {
    const mutex = new Mutex()
    await expect(mutex.runExclusive(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    expect(await mutex.runExclusive(() => 'next')).toBe('next')
  })
})

describe('SequenceGate', () => {
  it('lets steps through in order whatever order they arrive in', async () => {
    const gate = new SequenceGate()
    const passed: number[] = []
    const step = async (order: number) => {
      await gate.wait(order)
      passed.push(order)
      gate.pass(order)
    }

    const later = [step(2), step(1)]
    await Promise.resolve()
    expect(passed).toEqual([])

    await step(0)
    await Promise.all(later)
    expect(passed).toEqual([0, 1, 2])
  })

  it('ignores a step passed twice', async () => {
    const gate = new SequenceGate()
    gate.pass(0)
    gate.pass(0)
    gate.pass(2)

    let released = false
    const waiting = gate.wait(3).then(() => {
      released = true
    })
    await Promise.resolve()
    expect(released).toBe(false)

    gate.pass(1)
    await waiting
    expect(released).toBe(true)
  })
})
