import { logger } from './logger.js'
import { ConfigError, SinkStateError } from './errors.js'
import { DistributionTrack } from './distribution-track.js'
import { PeerConnectionFactory, type AdmissionResult } from './peer-connection-factory.js'
import { RenderGate, type PendingSamplePolicy, type RenderOutcome } from './render-gate.js'
import { SessionRegistry } from './session-registry.js'
import { UnblockSignal } from './unblock-signal.js'
import type { StreamMode, VideoCodec } from './codec.js'
import type { PeerSessionInfo } from './peer-session.js'
import type { IceServer, MediaSample, PeerTransportFactory, SessionDescription } from './peer-transport.js'

const log = logger.child({ component: 'web-sink' })

export type WebSinkState = 'stopped' | 'started'

export type WebSinkOptions = {
  transports: PeerTransportFactory
  codec: VideoCodec
  mode?: StreamMode
  liveMode?: boolean
  pendingSamplePolicy?: PendingSamplePolicy
  iceServers?: IceServer[]
  negotiationTimeoutMs?: number
  peerQueueMaxBytes?: number
  createId?: () => string
}

type Running = {
  signal: UnblockSignal
  registry: SessionRegistry
  track: DistributionTrack
  gate: RenderGate
  factory: PeerConnectionFactory
}

/**
 * Host-facing lifecycle around the fan-out engine. Each `activate()` builds a
 * fresh registry, track, gate and factory; `deactivate()` tears them down in
 * reverse so no session outlives the track it was attached to.
 */
export class WebSink {
  private running: Running | null = null
  private liveMode: boolean

  constructor(private readonly options: WebSinkOptions) {
    this.liveMode = options.liveMode ?? false
  }

  get state(): WebSinkState {
    return this.running ? 'started' : 'stopped'
  }

  get isLive(): boolean {
    return this.liveMode
  }

  get codec(): VideoCodec {
    return this.options.codec
  }

  setLiveMode(liveMode: boolean): void {
    if (this.running) {
      throw new ConfigError('Cannot change live mode while the sink is running')
    }
    log.info({ from: this.liveMode, to: liveMode }, 'Changing is-live')
    this.liveMode = liveMode
  }

  activate(): void {
    if (this.running) throw new SinkStateError('Sink is already started')

    const signal = new UnblockSignal()
    const registry = new SessionRegistry(signal)
    const track = new DistributionTrack(registry, {
      codec: this.options.codec,
      mode: this.options.mode ?? 'sample',
    })
    const gate = new RenderGate(registry, track, signal, {
      liveMode: this.liveMode,
      pendingSamplePolicy: this.options.pendingSamplePolicy,
    })
    const factory = new PeerConnectionFactory({
      registry,
      track,
      transports: this.options.transports,
      iceServers: this.options.iceServers,
      negotiationTimeoutMs: this.options.negotiationTimeoutMs,
      peerQueueMaxBytes: this.options.peerQueueMaxBytes,
      createId: this.options.createId,
    })

    this.running = { signal, registry, track, gate, factory }
    log.info({ codec: track.mimeType, mode: track.mode, liveMode: this.liveMode }, 'Sink has started')
  }

  async deactivate(): Promise<void> {
    const running = this.running
    if (!running) throw new SinkStateError('Sink is not started')
    this.running = null

    running.gate.unlock()
    const closed = await running.registry.close()
    running.track.destroy()
    log.info({ closedSessions: closed }, 'Sink has stopped')
  }

  /**
   * Feed one upstream sample through the gate. Throws when the sink is not
   * started; that is fatal to the producer.
   */
  async render(sample: MediaSample): Promise<RenderOutcome> {
    return this.requireRunning().gate.render(sample)
  }

  unlock(): void {
    this.running?.gate.unlock()
  }

  unlockStop(): void {
    this.running?.gate.unlockStop()
  }

  async admit(offer: SessionDescription): Promise<AdmissionResult> {
    return this.requireRunning().factory.admit(offer)
  }

  /** Explicit hang-up. Returns false when the id is unknown. */
  disconnect(sessionId: string): boolean {
    return this.running?.registry.remove(sessionId) ?? false
  }

  peerCount(): number {
    return this.running?.registry.count() ?? 0
  }

  sessions(): PeerSessionInfo[] {
    return this.running?.registry.list() ?? []
  }

  blockedRenders(): number {
    return this.running?.gate.blockedCount() ?? 0
  }

  private requireRunning(): Running {
    if (!this.running) throw new SinkStateError('Sink is not started')
    return this.running
  }
}
