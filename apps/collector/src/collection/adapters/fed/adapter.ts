/**
 * Federal Reserve Adapter
 *
 * Press releases, FOMC statements, speeches, testimony and minutes from
 * the federalreserve.gov press feed. The feed is read during enumeration;
 * each in-range entry becomes one unit that fetches the article page.
 *
 * Documents are classified by keyword from the feed title and summary,
 * fingerprinted by URL, and exported as JSONL per document type.
 * The feed only carries recent items, so there is no incremental window.
 */

import { CollectionError, ParseError } from '../../errors.js'
import { fail, ok, type CollectionUnit, type SourceAdapter } from '../../types.js'
import { toIsoDate } from '../../utils/dates.js'
import { computeFingerprint } from '../../utils/fingerprint.js'
import { parseRssFeed, type FeedEntry } from '../../utils/rss.js'
import { canonicalizeUrl, isValidUrl } from '../../utils/url.js'
import { extractArticleText } from './content.js'
import { classifyFedDocument, extractSpeaker, FED_DATASETS, type FedDocumentType } from './document-types.js'

export const FED_RSS_URL = 'https://www.federalreserve.gov/feeds/press_all.xml'

export interface FedAdapterOptions {
  feedUrl?: string
}

export interface FedUnitMeta {
  entry: FeedEntry
  documentType: FedDocumentType
}

export type FedUnit = CollectionUnit<FedUnitMeta>

export function createFedAdapter(options: FedAdapterOptions = {}): SourceAdapter<string, FedUnitMeta> {
  const feedUrl = options.feedUrl ?? FED_RSS_URL

  return {
    manifest: {
      id: 'fed',
      name: 'Federal Reserve Board',
      version: '1.0.0',
      exportFormat: 'jsonl',
      baseUrls: ['https://www.federalreserve.gov'],
      supportsIncremental: false,
      watermarkPolicy: 'max',
      defaultLookbackDays: 30,
      politeness: { minIntervalMs: 1500, jitter: { minMs: 0, maxMs: 500 } },
      maxConcurrency: 1,
    },

    async *enumerateUnits(ctx) {
      const feed = await ctx.discover<FeedEntry[]>('press_all', async fetchCtx => {
        const body = await fetchCtx.http.getText(feedUrl, { signal: fetchCtx.signal })
        if (!body.ok) return body
        try {
          return ok(parseRssFeed(body.value))
        } catch (error) {
          return fail(error instanceof CollectionError ? error : new ParseError('Feed could not be read', { cause: error }))
        }
      })
      if (!feed.ok) throw feed.error

      const first = toIsoDate(ctx.range.start)
      const last = toIsoDate(ctx.range.end)
      let skipped = 0

      for (const entry of feed.value) {
        if (!entry.published || !isValidUrl(entry.link)) {
          skipped++
          continue
        }
        const day = toIsoDate(entry.published)
        if (day < first || day > last) continue

        const documentType = classifyFedDocument(entry.title, entry.summary)
        const unit: FedUnit = {
          sourceId: 'fed',
          key: canonicalizeUrl(entry.link),
          dataset: FED_DATASETS[documentType],
          fingerprint: computeFingerprint('fed', entry.link),
          meta: { entry, documentType },
        }
        yield unit
      }

      if (skipped > 0) {
        ctx.logger.warn('Feed entries without date or link skipped', { skipped })
      }
    },

    async fetch(unit, ctx) {
      return ctx.http.getText(unit.meta.entry.link, { signal: ctx.signal })
    },

    normalize(html, unit, ctx) {
      const { entry, documentType } = unit.meta
      const content = extractArticleText(html)
      const fingerprint = unit.fingerprint ?? computeFingerprint('fed', entry.link)

      return {
        records: [
          {
            dataset: unit.dataset,
            fingerprint,
            fields: {
              source: 'fed',
              timestamp_collected: ctx.collectedAt.toISOString(),
              timestamp_published: entry.published ? entry.published.toISOString() : null,
              url: entry.link,
              title: entry.title,
              content,
              document_type: documentType,
              speaker: documentType === 'speech' ? extractSpeaker(entry.title) : '',
              metadata: {
                rss_summary: entry.summary,
                rss_published: entry.publishedRaw,
                feed_id: entry.id,
                content_length: content.length,
                ...(content ? {} : { content_error: 'EMPTY_CONTENT' }),
              },
            },
          },
        ],
        dropped: [],
      }
    },

    async healthCheck(ctx) {
      const result = await ctx.http.getText(feedUrl, { signal: ctx.signal })
      return result.ok
    },
  }
}
