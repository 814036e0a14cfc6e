import * as cheerio from 'cheerio'

/**
 * Where a site keeps its article text. Content selectors are tried in
 * priority order and the first with more than `minContentLength`
 * characters wins; otherwise the whole body is used.
 */
export interface PageLayout {
  /** Stripped before any text is read */
  remove: string
  content: readonly string[]
  /** Elements whose end marks a line break in extracted text */
  blocks: string
  minContentLength: number
  /** Site chrome that survives selector-based extraction */
  noise: readonly RegExp[]
}

/**
 * Visible text of an element, one line per text block, blank lines
 * collapsed.
 */
function blockText($: cheerio.CheerioAPI, selector: string): string {
  const element = $(selector).first()
  if (element.length === 0) return ''

  return element
    .text()
    .split('\n')
    .map(line => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n')
}

/**
 * Extract the article text of a page.
 * Returns an empty string when the page has no readable text.
 */
export function extractPageText(html: string, layout: PageLayout): string {
  const $ = cheerio.load(html)
  $(layout.remove).remove()
  $('br').replaceWith('\n')
  $(layout.blocks).append('\n')

  let text = ''
  for (const selector of layout.content) {
    const candidate = blockText($, selector)
    if (candidate.length > layout.minContentLength) {
      text = candidate
      break
    }
  }

  if (text.length < layout.minContentLength) {
    text = blockText($, 'body')
  }

  for (const pattern of layout.noise) {
    text = text.replace(pattern, '')
  }

  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n')
    .trim()
}
