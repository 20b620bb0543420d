import { logger } from './logger.js'
import { DeliveryError, TrackClosedError } from './errors.js'
import { codecMimeType, type StreamMode, type VideoCodec } from './codec.js'
import type { MediaSample, TrackDescriptor } from './peer-transport.js'
import type { SessionRegistry } from './session-registry.js'

const log = logger.child({ component: 'distribution-track' })

export type DistributionTrackOptions = {
  codec: VideoCodec
  mode: StreamMode
  trackId?: string
  streamId?: string
}

/**
 * The single outbound stream shared by every admitted peer. A write reaches
 * each session of the registry snapshot taken at the time of the write.
 */
export class DistributionTrack {
  readonly codec: VideoCodec
  readonly mode: StreamMode
  readonly trackId: string
  readonly streamId: string
  private destroyed = false
  private written = 0

  constructor(
    private readonly registry: Pick<SessionRegistry, 'snapshot'>,
    options: DistributionTrackOptions,
  ) {
    this.codec = options.codec
    this.mode = options.mode
    this.trackId = options.trackId ?? 'video'
    this.streamId = options.streamId ?? 'livesink'
  }

  get mimeType(): string {
    return codecMimeType(this.codec)
  }

  get isDestroyed(): boolean {
    return this.destroyed
  }

  get samplesWritten(): number {
    return this.written
  }

  describe(): TrackDescriptor {
    return {
      codec: this.codec,
      mode: this.mode,
      trackId: this.trackId,
      streamId: this.streamId,
    }
  }

  /** Returns the number of sessions the sample was handed to. */
  writeSample(sample: MediaSample): number {
    if (this.destroyed) throw new TrackClosedError()
    const sessions = this.registry.snapshot()
    let handed = 0
    for (const session of sessions) {
      try {
        session.deliver(sample)
        handed += 1
      } catch (cause) {
        log.warn({ err: new DeliveryError(session.id, cause), sessionId: session.id }, 'Sample hand-off failed')
      }
    }
    this.written += 1
    log.trace({ bytes: sample.data.length, peers: handed }, 'Sample written')
    return handed
  }

  destroy(): void {
    this.destroyed = true
  }
}
