/**
 * Collection state machine.
 *
 * Each worker lane moves through the stages below for every unit it
 * processes. A lane returns to Enumerating to pull its next unit, and ends
 * in Idle (enumeration exhausted) or Failed.
 */

import type { ILogger } from '@macro-ingest/logger'
import type { RunState } from './types.js'

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  Idle: ['Enumerating'],
  Enumerating: ['FetchingUnit', 'Idle', 'Failed'],
  FetchingUnit: ['Normalizing', 'Enumerating', 'Idle', 'Failed'],
  Normalizing: ['Deduplicating', 'Enumerating', 'Idle', 'Failed'],
  Deduplicating: ['Exporting', 'Enumerating', 'Idle', 'Failed'],
  Exporting: ['Enumerating', 'Idle', 'Failed'],
  Failed: [],
}

export function canTransition(from: RunState, to: RunState): boolean {
  return from === to || TRANSITIONS[from].includes(to)
}

export class Lifecycle {
  private current: RunState = 'Idle'
  private readonly history: RunState[] = ['Idle']
  private readonly log?: ILogger

  constructor(logger?: ILogger) {
    this.log = logger
  }

  get state(): RunState {
    return this.current
  }

  get trail(): readonly RunState[] {
    return this.history
  }

  /**
   * @throws Error on a transition the state machine does not allow
   */
  to(next: RunState): void {
    if (next === this.current) return
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal state transition ${this.current} -> ${next}`)
    }
    this.log?.debug('State transition', { from: this.current, to: next })
    this.current = next
    this.history.push(next)
  }
}
