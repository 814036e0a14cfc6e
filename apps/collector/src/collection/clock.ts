/**
 * Time source for pacing and backoff. Injected so tests can run on
 * virtual time.
 */

import { RunCancelledError } from './errors.js'

export interface Clock {
  now(): number
  /** Resolves after ms; rejects with RunCancelledError when the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new RunCancelledError('Cancelled while waiting'))
        return
      }
      const onAbort = () => {
        clearTimeout(timer)
        reject(new RunCancelledError('Cancelled while waiting'))
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }, Math.max(0, ms))
      signal?.addEventListener('abort', onAbort, { once: true })
    }),
}
