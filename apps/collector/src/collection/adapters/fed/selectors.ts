/**
 * federalreserve.gov page structure.
 *
 * Article pages have no single stable container, so content selectors are
 * tried in priority order and the first with enough text wins.
 */

import type { PageLayout } from '../../utils/html-text.js'

export const FED_PAGE_LAYOUT: PageLayout = {
  remove: 'script, style, nav, header, footer, aside, noscript',

  // Highest priority first
  content: [
    'div#article', // Primary article container
    'div.col-xs-12.col-sm-8.col-md-8', // Common Fed layout
    'div.row',
    'article',
    'main',
    'div#content',
    'body', // Last resort
  ],

  blocks: 'p, div, li, h1, h2, h3, h4, h5, h6, tr, section, article, blockquote, pre, table',

  minContentLength: 200,

  noise: [
    /Skip to main content/gi,
    /Board of Governors[\s\S]*?Federal Reserve System/gi,
    /Stay Connected[\s\S]*?RSS/gi,
    /Last Update:[\s\S]*?\d{4}/gi,
  ],
}
