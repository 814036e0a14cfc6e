/**
 * RSS 2.0 parsing for central bank press and speech feeds.
 */

import { XMLParser } from 'fast-xml-parser'
import { ParseError } from '../errors.js'
import { isRecord } from './fields.js'

export interface FeedEntry {
  title: string
  link: string
  summary: string
  published: Date | null
  /** pubDate exactly as it appeared in the feed */
  publishedRaw: string
  id: string
  categories: string[]
}

function textOf(value: unknown): string {
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (isRecord(value) && '#text' in value) return textOf(value['#text'])
  return ''
}

function listOf(value: unknown): unknown[] {
  if (Array.isArray(value)) return value
  return value === undefined || value === null || value === '' ? [] : [value]
}

function stripHtml(value: string): string {
  return value
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

function parseDate(value: string): Date | null {
  if (!value) return null
  const time = Date.parse(value)
  return Number.isNaN(time) ? null : new Date(time)
}

/**
 * @throws ParseError when the document is not an RSS feed
 */
export function parseRssFeed(xml: string): FeedEntry[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    trimValues: true,
  })

  let document: unknown
  try {
    document = parser.parse(xml)
  } catch (error) {
    throw new ParseError('Feed is not valid XML', { cause: error })
  }

  const rss = isRecord(document) ? document.rss : undefined
  const channel = isRecord(rss) ? rss.channel : undefined
  if (!isRecord(channel)) {
    throw new ParseError('Feed has no rss/channel element')
  }

  const rawItems = listOf(channel.item)

  return rawItems.filter(isRecord).map(item => {
    const publishedRaw = textOf(item.pubDate)
    return {
      title: textOf(item.title),
      link: textOf(item.link),
      summary: stripHtml(textOf(item.description)),
      published: parseDate(publishedRaw),
      publishedRaw,
      id: textOf(item.guid),
      categories: listOf(item.category).map(textOf).filter(category => category.length > 0),
    }
  })
}
