import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { addLogSink, createLogger, redactContext, redactUrl, REDACTED, type LogEntry } from '../index.js'

describe('redactUrl', () => {
  it('masks credential query parameters', () => {
    const url = 'https://api.stlouisfed.org/fred/series/observations?series_id=DFF&api_key=test-secret'
    expect(redactUrl(url)).toBe(
      'https://api.stlouisfed.org/fred/series/observations?series_id=DFF&api_key=%5BREDACTED%5D'
    )
  })

  it('leaves URLs without credentials untouched', () => {
    const url = 'https://www.federalreserve.gov/feeds/press_all.xml'
    expect(redactUrl(url)).toBe(url)
  })

  it('ignores plain strings', () => {
    expect(redactUrl('token=abc')).toBe('token=abc')
  })
})

describe('redactContext', () => {
  it('masks sensitive keys at any depth', () => {
    const result = redactContext({
      sourceId: 'fred',
      apiKey: 'test-secret',
      nested: { authorization: 'Bearer test-token', attempt: 2 },
    })

    expect(result).toEqual({
      sourceId: 'fred',
      apiKey: REDACTED,
      nested: { authorization: REDACTED, attempt: 2 },
    })
  })

  it('serializes dates to ISO strings', () => {
    expect(redactContext({ at: new Date('2024-01-15T00:00:00Z') })).toEqual({
      at: '2024-01-15T00:00:00.000Z',
    })
  })
})

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL
  let entries: LogEntry[]
  let removeSink: () => void

  beforeEach(() => {
    entries = []
    removeSink = addLogSink(entry => entries.push(entry))
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    removeSink()
    vi.restoreAllMocks()
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL
    } else {
      process.env.LOG_LEVEL = originalLevel
    }
  })

  it('builds a component path for child loggers', () => {
    const logger = createLogger('collector').child('fetch').child('http')
    logger.info('Fetched', { statusCode: 200 })

    expect(entries).toHaveLength(1)
    expect(entries[0].service).toBe('collector')
    expect(entries[0].component).toBe('fetch:http')
    expect(entries[0].statusCode).toBe(200)
  })

  it('merges default context from object children', () => {
    const logger = createLogger('collector').child({ runId: 'run-1' })
    logger.warn('Slow source', { sourceId: 'ecb' })

    expect(entries[0].runId).toBe('run-1')
    expect(entries[0].sourceId).toBe('ecb')
    expect(entries[0].level).toBe('warn')
  })

  it('drops entries below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn'
    const logger = createLogger('collector')
    logger.info('hidden')
    logger.debug('hidden')
    logger.warn('shown')

    expect(entries.map(e => e.message)).toEqual(['shown'])
  })

  it('attaches error details', () => {
    const logger = createLogger('collector')
    logger.warn('Failed', {}, new Error('boom'))

    expect(entries[0].error?.name).toBe('Error')
    expect(entries[0].error?.message).toBe('boom')
  })
})
