import { describe, it, expect } from 'vitest'
import { Lifecycle, canTransition } from '../lifecycle.js'

describe('Lifecycle', () => {
  it('starts in Idle and records every transition', () => {
    const lifecycle = new Lifecycle()
    lifecycle.to('Enumerating')
    lifecycle.to('FetchingUnit')
    lifecycle.to('Normalizing')
    lifecycle.to('Deduplicating')
    lifecycle.to('Exporting')
    lifecycle.to('Enumerating')
    lifecycle.to('Idle')

    expect(lifecycle.state).toBe('Idle')
    expect(lifecycle.trail).toEqual([
      'Idle',
      'Enumerating',
      'FetchingUnit',
      'Normalizing',
      'Deduplicating',
      'Exporting',
      'Enumerating',
      'Idle',
    ])
  })

  it('treats a transition to the current state as a no-op', () => {
    const lifecycle = new Lifecycle()
    lifecycle.to('Idle')
    expect(lifecycle.trail).toEqual(['Idle'])
  })

  it('rejects skipping stages', () => {
    const lifecycle = new Lifecycle()
    lifecycle.to('Enumerating')
    expect(() => lifecycle.to('Exporting')).toThrow('Illegal state transition Enumerating -> Exporting')
  })

  it('lets a failed unit return to enumeration', () => {
    expect(canTransition('FetchingUnit', 'Enumerating')).toBe(true)
    expect(canTransition('Normalizing', 'Enumerating')).toBe(true)
  })

  it('has no way out of Failed', () => {
    expect(canTransition('Failed', 'Idle')).toBe(false)
    expect(canTransition('Failed', 'Enumerating')).toBe(false)
    expect(canTransition('Idle', 'FetchingUnit')).toBe(false)
  })
})
