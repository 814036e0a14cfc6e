/**
 * bankofengland.co.uk page structure.
 */

import type { PageLayout } from '../../utils/html-text.js'

export const BOE_PAGE_LAYOUT: PageLayout = {
  remove: [
    'script, style, nav, header, footer, aside, form, button, noscript',
    // Site chrome
    '.cookie-notice, .nav-bypass, .global-header, .global-footer, .page-survey',
    '.accordion, .pdf-button, .footer-social-bank, .footer-topics',
  ].join(', '),

  content: [
    'div.content-block',
    'div.page-content',
    'section.page-section',
    'div.accordion-content',
    'article',
    'main#main-content',
    'body',
  ],

  blocks: 'p, div, li, h1, h2, h3, h4, h5, h6, tr, section, article, blockquote, pre, table',

  minContentLength: 200,

  noise: [],
}

export const PAGE_SELECTORS = {
  title: ['h1[itemprop="name"]', 'h1'],
  publishedDate: 'div.published-date',
  publishedMeta: [
    'meta[property="article:published_time"]',
    'meta[name="pubdate"]',
    'meta[name="datePublished"]',
  ],
  author: 'meta[name="author"]',
} as const
