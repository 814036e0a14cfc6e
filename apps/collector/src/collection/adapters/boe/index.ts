export { BOE_FEEDS, BOE_SITEMAP_URL, createBoeAdapter } from './adapter.js'
export type { BoeAdapterOptions, BoeDiscovery, BoeUnit, BoeUnitMeta } from './adapter.js'
export { BOE_DATASETS, classifyBoeDocument } from './document-types.js'
export type { BoeDocumentType } from './document-types.js'
export { parsePublishedDate, readBoePage } from './page.js'
export type { BoePage } from './page.js'
export { isDocumentPath, parseSitemap } from './sitemap.js'
export type { SitemapEntry } from './sitemap.js'
