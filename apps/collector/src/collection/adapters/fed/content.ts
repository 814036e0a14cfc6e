import { extractPageText } from '../../utils/html-text.js'
import { FED_PAGE_LAYOUT } from './selectors.js'

/**
 * Extract the article text of a federalreserve.gov page.
 * Returns an empty string when the page has no readable text.
 */
export function extractArticleText(html: string): string {
  return extractPageText(html, FED_PAGE_LAYOUT)
}
