/**
 * The Bank of England publishes one XML sitemap of every page. Only
 * document pages are collected from it.
 */

import { XMLParser } from 'fast-xml-parser'
import { ParseError } from '../../errors.js'
import { isRecord } from '../../utils/fields.js'

export interface SitemapEntry {
  loc: string
  lastmod: Date | null
  /** lastmod exactly as it appeared, '' when absent */
  lastmodRaw: string
}

const DOCUMENT_PATHS: readonly RegExp[] = [
  /\/speech\/20\d{2}\//,
  /\/news\/20\d{2}\//,
  /\/minutes\/20\d{2}\//,
  /\/monetary-policy-summary/,
  /\/monetary-policy-committee\//,
]

export function isDocumentPath(url: string): boolean {
  return DOCUMENT_PATHS.some(pattern => pattern.test(url))
}

function textOf(value: unknown): string {
  if (typeof value === 'string') return value.trim()
  if (isRecord(value) && '#text' in value) return textOf(value['#text'])
  return ''
}

/**
 * @throws ParseError when the document is not a urlset sitemap
 */
export function parseSitemap(xml: string): SitemapEntry[] {
  const parser = new XMLParser({ ignoreAttributes: true, parseTagValue: false, trimValues: true })

  let document: unknown
  try {
    document = parser.parse(xml)
  } catch (error) {
    throw new ParseError('Sitemap is not valid XML', { cause: error })
  }

  const urlset = isRecord(document) ? document.urlset : undefined
  if (!isRecord(urlset)) {
    throw new ParseError('Sitemap has no urlset element')
  }

  const urls: unknown[] = Array.isArray(urlset.url) ? urlset.url : urlset.url ? [urlset.url] : []

  return urls.filter(isRecord).flatMap(url => {
    const loc = textOf(url.loc)
    if (!loc) return []
    const lastmodRaw = textOf(url.lastmod)
    const time = lastmodRaw ? Date.parse(lastmodRaw) : Number.NaN
    return [{ loc, lastmod: Number.isNaN(time) ? null : new Date(time), lastmodRaw }]
  })
}
