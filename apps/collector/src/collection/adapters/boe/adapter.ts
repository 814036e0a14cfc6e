/**
 * Bank of England Adapter
 *
 * Speeches, Monetary Policy Summaries, MPC material and news from
 * bankofengland.co.uk. Documents are discovered along several paths: the
 * news, speeches and prudential regulation RSS feeds, and the site map.
 * The same page often shows up on more than one path. Every unit carries
 * the fingerprint of its canonical URL, so the orchestrator collects each
 * page once and skips the other sightings as already seen.
 *
 * A path that cannot be read is logged and skipped; enumeration only
 * fails when no path can be read.
 */

import { CollectionError, ParseError } from '../../errors.js'
import {
  fail,
  ok,
  type BronzeValue,
  type CollectionUnit,
  type DateRange,
  type FetchContext,
  type Result,
  type SourceAdapter,
} from '../../types.js'
import { toIsoDate } from '../../utils/dates.js'
import { computeFingerprint } from '../../utils/fingerprint.js'
import { parseRssFeed } from '../../utils/rss.js'
import { canonicalizeUrl, isValidUrl } from '../../utils/url.js'
import { BOE_DATASETS, classifyBoeDocument, type BoeDocumentType } from './document-types.js'
import { readBoePage } from './page.js'
import { isDocumentPath, parseSitemap } from './sitemap.js'

const BASE_URL = 'https://www.bankofengland.co.uk'

export const BOE_FEEDS: Readonly<Record<string, string>> = {
  news: `${BASE_URL}/rss/news`,
  speeches: `${BASE_URL}/rss/speeches`,
  prudential: `${BASE_URL}/rss/prudential-regulation-publications`,
}

export const BOE_SITEMAP_URL = `${BASE_URL}/_api/sitemap/getsitemap`

export interface BoeAdapterOptions {
  /** Feed name to URL; defaults to BOE_FEEDS */
  feeds?: Readonly<Record<string, string>>
  sitemapUrl?: string
}

/** A document page as seen on one discovery path */
export interface BoeDiscovery {
  /** "rss:<feed>" or "sitemap" */
  path: string
  url: string
  title: string
  published: Date | null
  /** Path-specific metadata carried into the record */
  metadata: Record<string, BronzeValue>
}

export interface BoeUnitMeta {
  discovery: BoeDiscovery
  documentType: BoeDocumentType
}

export type BoeUnit = CollectionUnit<BoeUnitMeta>

interface DiscoveryPath {
  name: string
  read: (ctx: FetchContext) => Promise<Result<BoeDiscovery[]>>
}

function parsed<T>(parse: () => T, what: string): Result<T> {
  try {
    return ok(parse())
  } catch (error) {
    return fail(error instanceof CollectionError ? error : new ParseError(`${what} could not be read`, { cause: error }))
  }
}

function inRange(date: Date, range: DateRange): boolean {
  const day = toIsoDate(date)
  return day >= toIsoDate(range.start) && day <= toIsoDate(range.end)
}

function feedPath(name: string, url: string, range: DateRange): DiscoveryPath {
  const path = `rss:${name}`
  return {
    name: path,
    async read(ctx) {
      const body = await ctx.http.getText(url, { signal: ctx.signal })
      if (!body.ok) return body
      const entries = parsed(() => parseRssFeed(body.value), 'Feed')
      if (!entries.ok) return entries

      return ok(
        entries.value
          .filter(entry => entry.published !== null && inRange(entry.published, range) && isValidUrl(entry.link))
          .map(entry => ({
            path,
            url: canonicalizeUrl(entry.link),
            title: entry.title,
            published: entry.published,
            metadata: { rss_summary: entry.summary, rss_id: entry.id, rss_tags: entry.categories },
          }))
      )
    },
  }
}

function sitemapPath(url: string, range: DateRange): DiscoveryPath {
  return {
    name: 'sitemap',
    async read(ctx) {
      const body = await ctx.http.getText(url, { signal: ctx.signal })
      if (!body.ok) return body
      const entries = parsed(() => parseSitemap(body.value), 'Sitemap')
      if (!entries.ok) return entries

      // Pages without a usable lastmod are kept; their date comes from the page
      return ok(
        entries.value
          .filter(entry => isValidUrl(entry.loc) && isDocumentPath(entry.loc))
          .filter(entry => entry.lastmod === null || inRange(entry.lastmod, range))
          .map(entry => ({
            path: 'sitemap',
            url: canonicalizeUrl(entry.loc),
            title: '',
            published: entry.lastmod,
            metadata: { sitemap_lastmod: entry.lastmodRaw },
          }))
      )
    },
  }
}

export function createBoeAdapter(options: BoeAdapterOptions = {}): SourceAdapter<string, BoeUnitMeta> {
  const feeds = options.feeds ?? BOE_FEEDS
  const sitemapUrl = options.sitemapUrl ?? BOE_SITEMAP_URL

  return {
    manifest: {
      id: 'boe',
      name: 'Bank of England',
      version: '1.0.0',
      exportFormat: 'jsonl',
      baseUrls: [BASE_URL],
      supportsIncremental: false,
      watermarkPolicy: 'max',
      defaultLookbackDays: 30,
      politeness: { minIntervalMs: 2000, jitter: { minMs: 0, maxMs: 500 } },
      maxConcurrency: 2,
    },

    async *enumerateUnits(ctx) {
      const paths = [
        ...Object.entries(feeds).map(([name, url]) => feedPath(name, url, ctx.range)),
        sitemapPath(sitemapUrl, ctx.range),
      ]
      let lastError: CollectionError | undefined
      let pathsRead = 0

      for (const path of paths) {
        const found = await ctx.discover(path.name, path.read)
        if (!found.ok) {
          lastError = found.error
          ctx.logger.warn('Discovery path skipped', { path: path.name, errorKind: found.error.kind }, found.error)
          continue
        }
        pathsRead++

        ctx.logger.info('Discovery path read', { path: path.name, documents: found.value.length })
        for (const discovery of found.value) {
          const documentType = classifyBoeDocument(discovery.url, discovery.title)
          const unit: BoeUnit = {
            sourceId: 'boe',
            key: `${discovery.path}:${discovery.url}`,
            dataset: BOE_DATASETS[documentType],
            fingerprint: computeFingerprint('boe', discovery.url),
            meta: { discovery, documentType },
          }
          yield unit
        }
      }

      if (pathsRead === 0 && lastError) throw lastError
    },

    async fetch(unit, ctx) {
      return ctx.http.getText(unit.meta.discovery.url, { signal: ctx.signal })
    },

    normalize(html, unit, ctx) {
      const { discovery, documentType } = unit.meta
      const page = readBoePage(html)
      const published = page.published ?? discovery.published

      return {
        records: [
          {
            dataset: unit.dataset,
            fingerprint: unit.fingerprint ?? computeFingerprint('boe', discovery.url),
            fields: {
              source: 'boe',
              timestamp_collected: ctx.collectedAt.toISOString(),
              timestamp_published: published ? published.toISOString() : null,
              url: discovery.url,
              title: page.title || discovery.title,
              content: page.content,
              document_type: documentType,
              speaker: documentType === 'speech' ? page.speaker : '',
              metadata: {
                discovery_path: discovery.path,
                ...discovery.metadata,
                content_length: page.content.length,
                ...(page.content ? {} : { content_error: 'EMPTY_CONTENT' }),
              },
            },
          },
        ],
        dropped: [],
      }
    },

    async healthCheck(ctx) {
      const [firstFeed] = Object.values(feeds)
      const result = await ctx.http.getText(firstFeed ?? sitemapUrl, { signal: ctx.signal })
      return result.ok
    },
  }
}
