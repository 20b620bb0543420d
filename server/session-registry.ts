import { logger } from './logger.js'
import { DuplicateIdError, SinkStateError } from './errors.js'
import type { PeerSession, PeerSessionInfo } from './peer-session.js'
import type { UnblockSignal } from './unblock-signal.js'

const log = logger.child({ component: 'session-registry' })

/**
 * Who is currently connected. Every operation here runs to completion
 * without yielding, so inserts and removals are atomic with respect to
 * snapshots taken by the fan-out path.
 */
export class SessionRegistry {
  private sessions = new Map<string, PeerSession>()
  private closed = false

  constructor(private readonly signal?: UnblockSignal) {}

  insert(id: string, session: PeerSession): void {
    if (this.closed) throw new SinkStateError('Session registry is closed')
    if (this.sessions.has(id)) throw new DuplicateIdError(id)
    this.sessions.set(id, session)
    this.publishSize()
    log.info({ sessionId: id, count: this.sessions.size }, 'Client count changed')
  }

  /**
   * Idempotent. The entry leaves the map before its transport is closed, so
   * no snapshot taken afterwards can reach a closed transport.
   */
  remove(id: string): boolean {
    const session = this.sessions.get(id)
    if (!session) return false
    this.sessions.delete(id)
    this.publishSize()
    log.info({ sessionId: id, count: this.sessions.size }, 'Client count changed')
    session.close().catch((err) => {
      log.warn({ err, sessionId: id }, 'Session close failed')
    })
    return true
  }

  has(id: string): boolean {
    return this.sessions.has(id)
  }

  get(id: string): PeerSession | undefined {
    return this.sessions.get(id)
  }

  count(): number {
    return this.sessions.size
  }

  snapshot(): readonly PeerSession[] {
    return Object.freeze(Array.from(this.sessions.values()))
  }

  list(): PeerSessionInfo[] {
    return Array.from(this.sessions.values()).map((session) => session.info())
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Remove and close every session, then refuse further inserts. */
  async close(): Promise<number> {
    this.closed = true
    const sessions = Array.from(this.sessions.values())
    this.sessions.clear()
    if (sessions.length > 0) this.publishSize()
    await Promise.all(sessions.map((session) => session.close()))
    log.info({ count: sessions.length }, 'Cleared peer connections')
    return sessions.length
  }

  private publishSize(): void {
    this.signal?.notify({ type: 'size-changed', count: this.sessions.size })
  }
}
