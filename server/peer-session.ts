import { logger, withLogContext } from './logger.js'
import { DeliveryError } from './errors.js'
import { PeerOutboundQueue } from './peer-outbound-queue.js'
import type { ConnectionState, MediaSample, PeerTransport } from './peer-transport.js'

const log = logger.child({ component: 'peer-session' })

export type PeerSessionInfo = {
  sessionId: string
  connectionState: ConnectionState
  createdAt: number
  deliveredSamples: number
  droppedSamples: number
  deliveryFailures: number
  closed: boolean
}

/**
 * A registry entry: one transport plus its outbound queue. The session owns
 * the transport exclusively; `close()` releases it once no matter how many
 * times it is called.
 */
export class PeerSession {
  readonly createdAt = Date.now()
  private state: ConnectionState = 'new'
  private readonly queue: PeerOutboundQueue
  private draining = false
  private closePromise: Promise<void> | null = null
  private delivered = 0
  private failures = 0
  private unsubscribe: (() => void) | null = null

  constructor(
    readonly id: string,
    private readonly transport: PeerTransport,
    queueMaxBytes?: number,
  ) {
    this.queue = new PeerOutboundQueue(queueMaxBytes)
  }

  get connectionState(): ConnectionState {
    return this.state
  }

  get isClosed(): boolean {
    return this.closePromise !== null
  }

  /** Subscribe to transport state changes. Must be called before the session is shared. */
  observe(listener: (session: PeerSession, state: ConnectionState) => void): void {
    this.unsubscribe?.()
    this.unsubscribe = this.transport.onConnectionStateChange((state) => {
      if (this.isClosed) return
      this.state = state
      listener(this, state)
    })
  }

  /** Queue a sample for this peer. Never waits on the transport. */
  deliver(sample: MediaSample): void {
    if (this.isClosed) return
    this.queue.enqueue(sample)
    this.scheduleDrain()
  }

  close(): Promise<void> {
    if (this.closePromise) return this.closePromise
    this.queue.clear()
    this.unsubscribe?.()
    this.unsubscribe = null
    this.state = 'closed'
    this.closePromise = withLogContext({ sessionId: this.id }, () =>
      this.transport.close().catch((err) => {
        log.warn({ err }, 'Transport close failed')
      }),
    )
    return this.closePromise
  }

  info(): PeerSessionInfo {
    return {
      sessionId: this.id,
      connectionState: this.state,
      createdAt: this.createdAt,
      deliveredSamples: this.delivered,
      droppedSamples: this.queue.droppedCount(),
      deliveryFailures: this.failures,
      closed: this.isClosed,
    }
  }

  private scheduleDrain(): void {
    if (this.draining) return
    this.draining = true
    withLogContext({ sessionId: this.id }, () => this.drainQueue())
      .catch((err) => {
        log.error({ err, sessionId: this.id }, 'Outbound queue drain aborted')
      })
      .finally(() => {
        this.draining = false
        if (!this.isClosed && this.queue.size() > 0) this.scheduleDrain()
      })
  }

  private async drainQueue(): Promise<void> {
    let sample = this.queue.shift()
    while (sample && !this.isClosed) {
      try {
        await this.transport.writeSample(sample)
        this.delivered += 1
      } catch (cause) {
        this.failures += 1
        const err = new DeliveryError(this.id, cause)
        log.warn({ err, failures: this.failures }, 'Sample delivery failed')
      }
      sample = this.queue.shift()
    }
  }
}
