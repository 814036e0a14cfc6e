import { describe, it, expect } from 'vitest'
import { Deduplicator } from '../process/dedupe.js'
import type { NormalizedRecord } from '../types.js'

function record(fingerprint: string | undefined, title = 'Statement', collectedAt = '2024-03-01T00:00:00.000Z'): NormalizedRecord {
  return {
    dataset: 'statements',
    fingerprint,
    fields: { source: 'fed', timestamp_collected: collectedAt, title },
  }
}

describe('Deduplicator', () => {
  it('rebuilds the seen set from a fingerprint source', async () => {
    const dedupe = await Deduplicator.load('fed', {
      readFingerprints: async () => ['a', 'b', 'a'],
    })
    expect(dedupe.size).toBe(2)
    expect(dedupe.has('a')).toBe(true)
    expect(dedupe.isNew('c')).toBe(true)
  })

  it('drops records already in the seen set', () => {
    const dedupe = new Deduplicator('fed', ['a'])
    const outcome = dedupe.filter([record('a'), record('b')], 'unit-1')

    expect(outcome.kept.map(r => r.fingerprint)).toEqual(['b'])
    expect(outcome.duplicates).toEqual([{ fingerprint: 'a', unitKey: 'unit-1', firstUnitKey: undefined, conflict: false }])
    expect(outcome.claimed).toEqual(['b'])
  })

  it('drops repeats within one batch', () => {
    const dedupe = new Deduplicator('gdelt')
    const outcome = dedupe.filter([record('x'), record('x'), record('y')], 'gkg:2024-01-01')

    expect(outcome.kept.map(r => r.fingerprint)).toEqual(['x', 'y'])
    expect(outcome.duplicates).toHaveLength(1)
  })

  it('lets the first discovering unit win across units of one run', () => {
    const dedupe = new Deduplicator('fed')
    const first = dedupe.filter([record('doc')], 'speeches-feed')
    const second = dedupe.filter([record('doc')], 'press-feed')

    expect(first.kept).toHaveLength(1)
    expect(second.kept).toHaveLength(0)
    expect(second.duplicates[0].firstUnitKey).toBe('speeches-feed')
  })

  it('flags conflicting metadata but keeps the first record', () => {
    const dedupe = new Deduplicator('fed')
    dedupe.filter([record('doc', 'Original title')], 'unit-1')
    const outcome = dedupe.filter([record('doc', 'Edited title')], 'unit-2')

    expect(outcome.duplicates[0].conflict).toBe(true)
  })

  it('ignores collection time when comparing metadata', () => {
    const dedupe = new Deduplicator('fed')
    dedupe.filter([record('doc', 'Same', '2024-03-01T00:00:00.000Z')], 'unit-1')
    const outcome = dedupe.filter([record('doc', 'Same', '2024-03-02T00:00:00.000Z')], 'unit-2')

    expect(outcome.duplicates[0].conflict).toBe(false)
  })

  it('always keeps records without a fingerprint', () => {
    const dedupe = new Deduplicator('fred')
    const outcome = dedupe.filter([record(undefined), record(undefined)], 'DFF')
    expect(outcome.kept).toHaveLength(2)
    expect(outcome.claimed).toEqual([])
  })

  it('commits claims to the seen set only on commit', () => {
    const dedupe = new Deduplicator('fed')
    const outcome = dedupe.filter([record('doc')], 'unit-1')

    expect(dedupe.has('doc')).toBe(false)
    expect(dedupe.isNew('doc')).toBe(false)

    dedupe.commit(outcome.claimed)
    expect(dedupe.has('doc')).toBe(true)
    expect(dedupe.size).toBe(1)
  })

  it('frees released claims for another unit', () => {
    const dedupe = new Deduplicator('fed')
    const outcome = dedupe.filter([record('doc')], 'unit-1')
    dedupe.release(outcome.claimed)

    expect(dedupe.claim('doc', 'unit-2')).toBe(true)
  })

  it('lets a unit re-claim its own fingerprint', () => {
    const dedupe = new Deduplicator('fed')
    expect(dedupe.claim('doc', 'unit-1')).toBe(true)
    expect(dedupe.claim('doc', 'unit-1')).toBe(true)
    expect(dedupe.claim('doc', 'unit-2')).toBe(false)

    const outcome = dedupe.filter([record('doc')], 'unit-1')
    expect(outcome.kept).toHaveLength(1)
  })

  it('never forgets a committed fingerprint', () => {
    const dedupe = new Deduplicator('fed', ['doc'])
    dedupe.release(['doc'])
    expect(dedupe.has('doc')).toBe(true)
    expect(dedupe.claim('doc', 'unit-1')).toBe(false)
  })
})
