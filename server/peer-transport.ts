import type { StreamMode, VideoCodec } from './codec.js'

/** Default frame duration when the producer supplies none (30 fps). */
export const DEFAULT_SAMPLE_DURATION_NS = 33_333_333

export type MediaSample = Readonly<{
  data: Buffer
  durationNs: number
}>

export function createSample(data: Buffer, durationNs?: number): MediaSample {
  const duration = typeof durationNs === 'number' && Number.isFinite(durationNs) && durationNs > 0
    ? durationNs
    : DEFAULT_SAMPLE_DURATION_NS
  return Object.freeze({ data, durationNs: duration })
}

export type SessionDescription = {
  type: 'offer' | 'answer'
  sdp: string
}

export const CONNECTION_STATES = ['new', 'connecting', 'connected', 'disconnected', 'failed', 'closed'] as const
export type ConnectionState = typeof CONNECTION_STATES[number]

export function isConnectionState(value: string): value is ConnectionState {
  return CONNECTION_STATES.some((state) => state === value)
}

export function isTerminalState(state: ConnectionState): boolean {
  return state === 'disconnected' || state === 'failed' || state === 'closed'
}

export type IceServer = {
  urls: string
  username?: string
  credential?: string
}

export type TrackDescriptor = {
  codec: VideoCodec
  mode: StreamMode
  trackId: string
  streamId: string
}

/**
 * One negotiated realtime connection to a browser. Implementations wrap a
 * WebRTC stack; the sink never inspects the wire protocol.
 */
export interface PeerTransport {
  setRemoteDescription(offer: SessionDescription): Promise<void>
  createAnswer(): Promise<SessionDescription>
  setLocalDescription(answer: SessionDescription): Promise<void>
  /** Resolves once every local candidate is known and the local description is final. */
  waitForGatheringComplete(): Promise<void>
  localDescription(): SessionDescription | undefined
  /** Returns an unsubscribe function. */
  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void
  writeSample(sample: MediaSample): Promise<void>
  close(): Promise<void>
}

export type PeerTransportOptions = {
  track: TrackDescriptor
  iceServers: IceServer[]
}

export interface PeerTransportFactory {
  create(options: PeerTransportOptions): PeerTransport
}
