/**
 * URL Canonicalization Utilities
 *
 * Rules:
 * 1. Enforce https (upgrade http)
 * 2. Remove tracking parameters: utm_*, fbclid, gclid, ref, campaign
 * 3. Remove fragment identifiers (#...)
 * 4. Lowercase hostname
 * 5. Remove trailing slash (except root path)
 * 6. Remove empty query parameters
 * 7. Sort query parameters alphabetically (for consistent hashing)
 */

const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'ref', 'campaign'])

/**
 * Canonicalize a URL for deduplication.
 *
 * @throws TypeError if the URL cannot be parsed
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url.trim())

  parsed.protocol = 'https:'
  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}
