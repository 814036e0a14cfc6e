import * as cheerio from 'cheerio'
import { extractPageText } from '../../utils/html-text.js'
import { BOE_PAGE_LAYOUT, PAGE_SELECTORS } from './selectors.js'

export interface BoePage {
  title: string
  published: Date | null
  speaker: string
  content: string
}

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

/**
 * "08 February 2026", "8 Feb 2026", "February 8, 2026" or "2026-02-08",
 * as midnight UTC.
 */
export function parsePublishedDate(text: string): Date | null {
  const value = text.replace(/^published on\s+/i, '').trim()

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value)
  if (iso) return utcDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]))

  const dayFirst = /^(\d{1,2})\s+([a-z]+)\s+(\d{4})$/i.exec(value)
  if (dayFirst) return utcDate(Number(dayFirst[3]), monthIndex(dayFirst[2]), Number(dayFirst[1]))

  const monthFirst = /^([a-z]+)\s+(\d{1,2}),\s*(\d{4})$/i.exec(value)
  if (monthFirst) return utcDate(Number(monthFirst[3]), monthIndex(monthFirst[1]), Number(monthFirst[2]))

  return null
}

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase())
}

function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 0 || day < 1 || day > 31) return null
  const date = new Date(Date.UTC(year, month, day))
  return date.getUTCMonth() === month ? date : null
}

function lines(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
}

function speakerIn(candidates: readonly string[]): string {
  for (const line of candidates) {
    const at = line.toLowerCase().indexOf('speech by ')
    if (at >= 0) return line.slice(at + 'speech by '.length).trim()
  }
  return ''
}

/**
 * Read title, publication date, speaker and article text from a document page.
 */
export function readBoePage(html: string): BoePage {
  const $ = cheerio.load(html)

  let title = ''
  for (const selector of PAGE_SELECTORS.title) {
    title = $(selector).first().text().replace(/\s+/g, ' ').trim()
    if (title) break
  }

  let published = parsePublishedDate($(PAGE_SELECTORS.publishedDate).first().text().trim())
  for (const selector of PAGE_SELECTORS.publishedMeta) {
    if (published) break
    const content = $(selector).attr('content')
    const time = content ? Date.parse(content) : Number.NaN
    published = Number.isNaN(time) ? null : new Date(time)
  }

  let speaker = $(PAGE_SELECTORS.author).attr('content')?.trim() ?? ''
  if (!speaker) {
    const heading = $('h1').first()
    speaker = speakerIn(lines(heading.parent().text()).slice(0, 25)) || speakerIn(lines($('main').text()).slice(0, 80))
  }

  return { title, published, speaker, content: extractPageText(html, BOE_PAGE_LAYOUT) }
}
