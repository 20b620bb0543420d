import dgram from 'dgram'
import { logger } from '../logger.js'
import { createSample } from '../peer-transport.js'
import { emptyStats, type SampleSink, type SourceStats } from './types.js'

const log = logger.child({ component: 'udp-rtp-source' })

const RTP_HEADER_SIZE = 12
export const DEFAULT_UDP_QUEUE_PACKETS = 512

export interface DatagramSocket {
  bind(port: number, address: string, onListening: () => void): void
  onMessage(listener: (msg: Buffer) => void): void
  onError(listener: (err: Error) => void): void
  close(): void
}

export function createUdpSocket(address: string): DatagramSocket {
  const socket = dgram.createSocket(address.includes(':') ? 'udp6' : 'udp4')
  return {
    bind: (port, host, onListening) => {
      socket.bind(port, host, onListening)
    },
    onMessage: (listener) => {
      socket.on('message', (msg) => listener(msg))
    },
    onError: (listener) => {
      socket.on('error', listener)
    },
    close: () => socket.close(),
  }
}

export function isRtpPacket(data: Buffer): boolean {
  return data.length >= RTP_HEADER_SIZE && data[0] >> 6 === 2
}

export type UdpRtpSourceOptions = {
  host: string
  port: number
  maxQueuedPackets?: number
  createSocket?: (address: string) => DatagramSocket
}

/**
 * Listens for RTP datagrams and renders each as one sample, in arrival
 * order. Datagrams arriving while the sink is blocked wait in a bounded
 * queue; the oldest are dropped past the bound.
 */
export class UdpRtpSource {
  private readonly queue: Buffer[] = []
  private readonly maxQueued: number
  private wake: (() => void) | null = null
  private stopped = false
  private overflowed = 0
  private socket: DatagramSocket | null = null

  constructor(
    private readonly sink: SampleSink,
    private readonly options: UdpRtpSourceOptions,
  ) {
    this.maxQueued = options.maxQueuedPackets ?? DEFAULT_UDP_QUEUE_PACKETS
  }

  get queuedPackets(): number {
    return this.queue.length
  }

  get overflowCount(): number {
    return this.overflowed
  }

  /** Resolves once the socket is bound. */
  listen(): Promise<void> {
    const create = this.options.createSocket ?? createUdpSocket
    const socket = create(this.options.host)
    this.socket = socket

    return new Promise((resolve, reject) => {
      let listening = false
      socket.onError((err) => {
        if (!listening) {
          reject(err)
          return
        }
        log.error({ err }, 'UDP socket error')
      })
      socket.onMessage((msg) => this.accept(msg))
      socket.bind(this.options.port, this.options.host, () => {
        listening = true
        log.info({ host: this.options.host, port: this.options.port }, 'Listening for RTP')
        resolve()
      })
    })
  }

  /** Render queued packets until stopped or the sink shuts down. */
  async run(): Promise<SourceStats> {
    const stats = emptyStats()
    while (!this.stopped) {
      const packet = this.queue.shift()
      if (!packet) {
        await new Promise<void>((resolve) => {
          this.wake = resolve
        })
        continue
      }

      stats.frames += 1
      const outcome = await this.sink.render(createSample(packet))
      if (outcome === 'delivered') stats.delivered += 1
      if (outcome === 'dropped') stats.dropped += 1
      if (outcome === 'shutdown') {
        stats.endedBy = 'shutdown'
        this.stop()
        return stats
      }
    }
    stats.endedBy = 'stopped'
    return stats
  }

  stop(): void {
    if (this.stopped) return
    this.stopped = true
    this.queue.length = 0
    this.socket?.close()
    this.socket = null
    this.notify()
  }

  private accept(msg: Buffer): void {
    if (this.stopped) return
    if (!isRtpPacket(msg)) {
      log.debug({ bytes: msg.length }, 'Ignoring non-RTP datagram')
      return
    }
    this.queue.push(msg)
    while (this.queue.length > this.maxQueued) {
      this.queue.shift()
      this.overflowed += 1
    }
    this.notify()
  }

  private notify(): void {
    const wake = this.wake
    this.wake = null
    wake?.()
  }
}
