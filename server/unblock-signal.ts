export type UnblockEvent =
  | { type: 'size-changed'; count: number }
  | { type: 'force-unblock' }

/**
 * Single-slot, last-value notification channel. `notify` never blocks: with
 * no waiter the event overwrites whatever is stored in the slot, with
 * waiters present every one of them wakes with the event.
 */
export class UnblockSignal {
  private slot: UnblockEvent | null = null
  private waiters = new Set<(event: UnblockEvent) => void>()

  notify(event: UnblockEvent): void {
    if (this.waiters.size === 0) {
      this.slot = event
      return
    }
    const waiters = Array.from(this.waiters)
    this.waiters.clear()
    for (const wake of waiters) wake(event)
  }

  wait(): Promise<UnblockEvent> {
    const pending = this.slot
    if (pending) {
      this.slot = null
      return Promise.resolve(pending)
    }
    return new Promise((resolve) => {
      this.waiters.add(resolve)
    })
  }

  pendingWaiters(): number {
    return this.waiters.size
  }

  /** Drop a stored event that nobody consumed. */
  clear(): void {
    this.slot = null
  }
}
