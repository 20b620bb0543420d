import {
  MediaStreamTrack,
  RTCPeerConnection,
  RTCRtpCodecParameters,
  RtpHeader,
  RtpPacket,
  type RTCRtpTransceiver,
} from 'werift'
import { logger } from './logger.js'
import { VIDEO_CLOCK_RATE, VIDEO_CODECS, codecMimeType } from './codec.js'
import { RtpSequencer, createPayloader, type Payloader } from './rtp/packetizer.js'
import {
  isConnectionState,
  type ConnectionState,
  type MediaSample,
  type PeerTransport,
  type PeerTransportFactory,
  type PeerTransportOptions,
  type SessionDescription,
} from './peer-transport.js'

const log = logger.child({ component: 'werift-transport' })

/** Dynamic payload type used on the local track; the sender rewrites it to the negotiated one. */
const LOCAL_PAYLOAD_TYPE = 96

function createCodecParameters(options: PeerTransportOptions): RTCRtpCodecParameters {
  const spec = VIDEO_CODECS[options.track.codec]
  return new RTCRtpCodecParameters({
    mimeType: spec.mimeType,
    clockRate: VIDEO_CLOCK_RATE,
    rtcpFeedback: [
      { type: 'nack' },
      { type: 'nack', parameter: 'pli' },
      { type: 'goog-remb' },
    ],
    parameters: spec.fmtp,
  })
}

/**
 * One browser connection backed by werift. The transport owns a private
 * track so every peer gets its own sequence numbers and timestamps.
 */
export class WeriftTransport implements PeerTransport {
  private readonly pc: RTCPeerConnection
  private readonly track: MediaStreamTrack
  private readonly transceiver: RTCRtpTransceiver
  private readonly payloader: Payloader | null
  private readonly sequencer = new RtpSequencer()
  private closed = false

  constructor(private readonly options: PeerTransportOptions) {
    this.pc = new RTCPeerConnection({
      iceServers: options.iceServers,
      codecs: { video: [createCodecParameters(options)] },
    })
    this.track = new MediaStreamTrack({ kind: 'video', id: options.track.trackId })
    this.transceiver = this.pc.addTransceiver(this.track, { direction: 'sendonly' })
    this.payloader = options.track.mode === 'sample' ? createPayloader(options.track.codec) : null
  }

  async setRemoteDescription(offer: SessionDescription): Promise<void> {
    await this.pc.setRemoteDescription({ type: offer.type, sdp: offer.sdp })
    if (this.transceiver.codecs.length === 0) {
      throw new Error(`${codecMimeType(this.options.track.codec)} codec not supported by the remote peer`)
    }
  }

  async createAnswer(): Promise<SessionDescription> {
    const answer = await this.pc.createAnswer()
    return { type: 'answer', sdp: answer.sdp }
  }

  async setLocalDescription(answer: SessionDescription): Promise<void> {
    await this.pc.setLocalDescription({ type: answer.type, sdp: answer.sdp })
  }

  waitForGatheringComplete(): Promise<void> {
    if (this.pc.iceGatheringState === 'complete') return Promise.resolve()
    return new Promise((resolve) => {
      const { unSubscribe } = this.pc.iceGatheringStateChange.subscribe((state) => {
        if (state !== 'complete') return
        unSubscribe()
        resolve()
      })
    })
  }

  localDescription(): SessionDescription | undefined {
    const description = this.pc.localDescription
    if (!description) return undefined
    return { type: 'answer', sdp: description.sdp }
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void {
    const { unSubscribe } = this.pc.connectionStateChange.subscribe((state) => {
      if (isConnectionState(state)) listener(state)
    })
    return unSubscribe
  }

  async writeSample(sample: MediaSample): Promise<void> {
    if (this.closed) return
    if (!this.payloader) {
      this.track.writeRtp(sample.data)
      return
    }

    const payloads = this.payloader.payload(sample.data)
    for (const fields of this.sequencer.frame(payloads, sample.durationNs)) {
      const header = new RtpHeader({
        payloadType: LOCAL_PAYLOAD_TYPE,
        sequenceNumber: fields.sequenceNumber,
        timestamp: fields.timestamp,
        marker: fields.marker,
      })
      this.track.writeRtp(new RtpPacket(header, fields.payload))
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.track.stop()
    await this.pc.close()
    log.debug({ trackId: this.options.track.trackId }, 'Peer connection closed')
  }
}

export class WeriftTransportFactory implements PeerTransportFactory {
  create(options: PeerTransportOptions): PeerTransport {
    return new WeriftTransport(options)
  }
}
