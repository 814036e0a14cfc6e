/**
 * Lets steps tagged 0, 1, 2, ... run in order even when their callers
 * finish out of order. `wait(n)` resolves once every step below n has
 * passed. Passing twice is a no-op.
 */
export class SequenceGate {
  private next = 0
  private readonly passed = new Set<number>()
  private readonly waiting = new Map<number, () => void>()

  wait(order: number): Promise<void> {
    if (order <= this.next) return Promise.resolve()
    return new Promise<void>(resolve => {
      this.waiting.set(order, resolve)
    })
  }

  pass(order: number): void {
    if (order < this.next || this.passed.has(order)) return
    this.passed.add(order)

    while (this.passed.has(this.next)) {
      this.passed.delete(this.next)
      this.next++
      const resume = this.waiting.get(this.next)
      if (resume) {
        this.waiting.delete(this.next)
        resume()
      }
    }
  }
}
