/**
 * Deduplicator
 *
 * Keeps the set of content fingerprints already exported for a source.
 * The set is rebuilt from prior export files at startup and never shrinks.
 *
 * Records are claimed while their unit is in flight and only become
 * "seen" once the unit's export commits, so a failed export never hides
 * a record from the next run. When two records share a fingerprint the
 * first one discovered wins; the later one is dropped and, if its fields
 * differ, the conflict is logged.
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@macro-ingest/logger'
import { loggers } from '../../config/logger.js'
import type { NormalizedRecord } from '../types.js'

export interface FingerprintSource {
  readFingerprints(sourceId: string): Promise<string[]>
}

export interface DuplicateRecord {
  fingerprint: string
  unitKey: string
  /** Unit that claimed the fingerprint first, when known */
  firstUnitKey?: string
  conflict: boolean
}

export interface DedupeOutcome {
  kept: NormalizedRecord[]
  duplicates: DuplicateRecord[]
  /** Fingerprints claimed for this unit; commit or release after export */
  claimed: string[]
}

interface FirstSeen {
  unitKey: string
  digest: string
}

export class Deduplicator {
  readonly sourceId: string
  private readonly seen: Set<string>
  private readonly pending = new Map<string, string>()
  private readonly firstSeen = new Map<string, FirstSeen>()
  private readonly log: ILogger

  constructor(sourceId: string, seen: Iterable<string> = [], logger?: ILogger) {
    this.sourceId = sourceId
    this.seen = new Set(seen)
    this.log = logger ?? loggers.dedupe
  }

  /**
   * Rebuild the seen set from a source's previous exports.
   */
  static async load(sourceId: string, source: FingerprintSource, logger?: ILogger): Promise<Deduplicator> {
    const fingerprints = await source.readFingerprints(sourceId)
    const deduplicator = new Deduplicator(sourceId, fingerprints, logger)
    deduplicator.log.info('Seen set loaded', { sourceId, fingerprints: deduplicator.size })
    return deduplicator
  }

  /** Committed fingerprints */
  get size(): number {
    return this.seen.size
  }

  has(fingerprint: string): boolean {
    return this.seen.has(fingerprint)
  }

  isNew(fingerprint: string): boolean {
    return !this.seen.has(fingerprint) && !this.pending.has(fingerprint)
  }

  markSeen(fingerprint: string): void {
    this.pending.delete(fingerprint)
    this.seen.add(fingerprint)
  }

  /**
   * Reserve a fingerprint for a unit. False when it is seen or claimed by
   * another unit; re-claiming by the same unit succeeds.
   */
  claim(fingerprint: string, unitKey: string): boolean {
    if (this.seen.has(fingerprint)) return false
    const owner = this.pending.get(fingerprint)
    if (owner !== undefined) return owner === unitKey
    this.pending.set(fingerprint, unitKey)
    return true
  }

  commit(fingerprints: Iterable<string>): void {
    for (const fingerprint of fingerprints) {
      this.markSeen(fingerprint)
    }
  }

  release(fingerprints: Iterable<string>): void {
    for (const fingerprint of fingerprints) {
      this.pending.delete(fingerprint)
    }
  }

  /**
   * Split a unit's records into kept and duplicate, claiming every kept
   * fingerprint. Records without a fingerprint always pass.
   */
  filter(records: readonly NormalizedRecord[], unitKey: string): DedupeOutcome {
    const kept: NormalizedRecord[] = []
    const duplicates: DuplicateRecord[] = []
    const claimed: string[] = []
    const keptHere = new Set<string>()

    for (const record of records) {
      const fingerprint = record.fingerprint
      if (!fingerprint) {
        kept.push(record)
        continue
      }

      const digest = digestFields(record)
      if (!keptHere.has(fingerprint) && this.claim(fingerprint, unitKey)) {
        this.firstSeen.set(fingerprint, { unitKey, digest })
        keptHere.add(fingerprint)
        claimed.push(fingerprint)
        kept.push(record)
        continue
      }

      const first = this.firstSeen.get(fingerprint)
      const conflict = first !== undefined && first.digest !== digest
      duplicates.push({ fingerprint, unitKey, firstUnitKey: first?.unitKey, conflict })

      if (conflict) {
        this.log.warn('DEDUPE_METADATA_CONFLICT', {
          event_name: 'DEDUPE_METADATA_CONFLICT',
          sourceId: this.sourceId,
          fingerprint,
          keptFrom: first?.unitKey,
          droppedFrom: unitKey,
          resolution: 'first_discovered_wins',
        })
      }
    }

    if (duplicates.length > 0) {
      this.log.debug('Duplicates dropped', { sourceId: this.sourceId, unitKey, duplicates: duplicates.length })
    }

    return { kept, duplicates, claimed }
  }
}

function digestFields(record: NormalizedRecord): string {
  const { timestamp_collected: _collected, ...rest } = record.fields
  const ordered = Object.keys(rest)
    .sort()
    .map(key => [key, rest[key]])
  return createHash('sha256').update(JSON.stringify(ordered)).digest('hex').slice(0, 16)
}
