import { createHash } from 'node:crypto'
import { canonicalizeUrl, isValidUrl } from './url.js'

/**
 * Stable content identity for deduplication: sha256 of "{source}|{identity}".
 * URLs are canonicalized first so tracking parameters and fragments do not
 * produce new fingerprints.
 */
export function computeFingerprint(sourceId: string, identity: string): string {
  const normalized = isValidUrl(identity) ? canonicalizeUrl(identity) : identity.trim()
  return createHash('sha256').update(`${sourceId}|${normalized}`).digest('hex')
}
