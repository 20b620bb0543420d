import { nanoid } from 'nanoid'
import { logger, withLogContext } from './logger.js'
import { LiveSinkError, NegotiationError, describeError } from './errors.js'
import { codecName, isUnsupportedCodecError } from './codec.js'
import { PeerSession } from './peer-session.js'
import {
  isTerminalState,
  type ConnectionState,
  type IceServer,
  type PeerTransport,
  type PeerTransportFactory,
  type SessionDescription,
} from './peer-transport.js'
import type { DistributionTrack } from './distribution-track.js'
import type { SessionRegistry } from './session-registry.js'

const log = logger.child({ component: 'peer-connection-factory' })

export type AdmissionResult = {
  sessionId: string
  answer: SessionDescription
  negotiatedCodec: string
}

export type PeerConnectionFactoryDeps = {
  registry: SessionRegistry
  track: DistributionTrack
  transports: PeerTransportFactory
  iceServers?: IceServer[]
  /** Extra bound on gathering completion. 0 leaves it to the transport. */
  negotiationTimeoutMs?: number
  peerQueueMaxBytes?: number
  createId?: () => string
}

export class PeerConnectionFactory {
  private readonly createId: () => string

  constructor(private readonly deps: PeerConnectionFactoryDeps) {
    this.createId = deps.createId ?? (() => nanoid())
  }

  /**
   * Run the full offer/answer exchange for one peer. On success the session
   * is registered; on any failure nothing of it is left in the registry.
   */
  async admit(offer: SessionDescription): Promise<AdmissionResult> {
    const sessionId = this.createId()
    return withLogContext({ sessionId }, () => this.negotiate(sessionId, offer))
  }

  private async negotiate(sessionId: string, offer: SessionDescription): Promise<AdmissionResult> {
    const { registry, track } = this.deps

    let transport: PeerTransport
    try {
      transport = this.deps.transports.create({
        track: track.describe(),
        iceServers: this.deps.iceServers ?? [],
      })
    } catch (err) {
      throw new NegotiationError(`Error creating peer connection: ${describeError(err)}`, sessionId, err)
    }

    const session = new PeerSession(sessionId, transport, this.deps.peerQueueMaxBytes)
    session.observe((observed, state) =>
      withLogContext({ sessionId: observed.id }, () => this.handleStateChange(observed, state)),
    )

    try {
      registry.insert(sessionId, session)
    } catch (err) {
      await session.close()
      throw err
    }
    log.info('Created new peer connection')

    try {
      await this.step(sessionId, 'Error setting remote description', () => transport.setRemoteDescription(offer))
      const answer = await this.step(sessionId, 'Error creating answer', () => transport.createAnswer())
      await this.step(sessionId, 'Error setting local description', () => transport.setLocalDescription(answer))
      await this.step(sessionId, 'Error waiting for ICE gathering', () => this.waitForGathering(transport))

      const finalAnswer = transport.localDescription()
      if (!finalAnswer) {
        throw new NegotiationError('Failed to get local description', sessionId)
      }
      if (registry.get(sessionId) !== session) {
        throw new NegotiationError('Peer connection closed during negotiation', sessionId)
      }

      const negotiatedCodec = track.mimeType.toLowerCase()
      log.info({ codec: negotiatedCodec }, 'WebRTC session established')
      return { sessionId, answer: finalAnswer, negotiatedCodec }
    } catch (err) {
      registry.remove(sessionId)
      await session.close()
      throw err
    }
  }

  private async step<T>(sessionId: string, label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (err instanceof LiveSinkError) throw err
      if (isUnsupportedCodecError(err)) {
        const codec = codecName(this.deps.track.codec).toUpperCase()
        log.error({ codec }, 'Codec is not supported by the browser')
        throw new NegotiationError(`Server is sending ${codec}. Codec is not supported by browser.`, sessionId, err)
      }
      throw new NegotiationError(`${label}: ${describeError(err)}`, sessionId, err)
    }
  }

  private waitForGathering(transport: PeerTransport): Promise<void> {
    const timeoutMs = this.deps.negotiationTimeoutMs ?? 0
    if (timeoutMs <= 0) return transport.waitForGatheringComplete()

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new Error(`gathering did not complete within ${timeoutMs}ms`)), timeoutMs)
    })
    return Promise.race([transport.waitForGatheringComplete(), timeout]).finally(() => clearTimeout(timer))
  }

  private handleStateChange(session: PeerSession, state: ConnectionState): void {
    if (isTerminalState(state)) {
      log.info({ state }, 'Peer disconnected, cleaning up')
      this.deps.registry.remove(session.id)
      return
    }
    log.debug({ state, peers: this.deps.registry.count() }, 'Peer connection state changed')
  }
}
