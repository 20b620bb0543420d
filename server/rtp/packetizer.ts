import { randomInt } from 'crypto'
import { VIDEO_CLOCK_RATE, type VideoCodec } from '../codec.js'

/** Payload budget per RTP packet, leaving room for IP/UDP/SRTP overhead. */
export const DEFAULT_RTP_MTU = 1200

const H264_NAL_AUD = 9
const H264_NAL_FU_A = 28
const H265_NAL_AUD = 35
const H265_NAL_FU = 49

/** Splits one encoded frame into RTP payloads. The last payload carries the marker bit. */
export interface Payloader {
  payload(frame: Buffer): Buffer[]
}

function isStartCode(data: Buffer, i: number): number {
  if (data[i] !== 0 || data[i + 1] !== 0) return 0
  if (data[i + 2] === 1) return 3
  if (data[i + 2] === 0 && data[i + 3] === 1) return 4
  return 0
}

/**
 * Split an Annex B byte stream into NAL units without their start codes.
 * Input without any start code is taken as a single NAL unit.
 */
export function splitAnnexB(data: Buffer): Buffer[] {
  const starts: Array<{ at: number; length: number }> = []
  for (let i = 0; i + 2 < data.length; i++) {
    const length = isStartCode(data, i)
    if (length > 0) {
      starts.push({ at: i, length })
      i += length - 1
    }
  }
  if (starts.length === 0) return data.length > 0 ? [data] : []

  const units: Buffer[] = []
  for (let n = 0; n < starts.length; n++) {
    const begin = starts[n].at + starts[n].length
    const end = n + 1 < starts.length ? starts[n + 1].at : data.length
    if (end > begin) units.push(data.subarray(begin, end))
  }
  return units
}

function chunk(data: Buffer, size: number): Buffer[] {
  const chunks: Buffer[] = []
  for (let offset = 0; offset < data.length; offset += size) {
    chunks.push(data.subarray(offset, offset + size))
  }
  return chunks
}

/** RFC 6184 packetization mode 1: single NAL unit packets and FU-A fragments. */
export class H264Payloader implements Payloader {
  constructor(private readonly mtu = DEFAULT_RTP_MTU) {}

  payload(frame: Buffer): Buffer[] {
    const payloads: Buffer[] = []
    for (const nal of splitAnnexB(frame)) {
      const nalType = nal[0] & 0x1f
      if (nalType === H264_NAL_AUD) continue
      if (nal.length <= this.mtu) {
        payloads.push(nal)
        continue
      }

      const indicator = (nal[0] & 0xe0) | H264_NAL_FU_A
      const fragments = chunk(nal.subarray(1), this.mtu - 2)
      fragments.forEach((fragment, index) => {
        let header = nalType
        if (index === 0) header |= 0x80
        if (index === fragments.length - 1) header |= 0x40
        payloads.push(Buffer.concat([Buffer.from([indicator, header]), fragment]))
      })
    }
    return payloads
  }
}

/** RFC 7798: single NAL unit packets and FU fragments. */
export class H265Payloader implements Payloader {
  constructor(private readonly mtu = DEFAULT_RTP_MTU) {}

  payload(frame: Buffer): Buffer[] {
    const payloads: Buffer[] = []
    for (const nal of splitAnnexB(frame)) {
      if (nal.length < 2) continue
      const nalType = (nal[0] >> 1) & 0x3f
      if (nalType === H265_NAL_AUD) continue
      if (nal.length <= this.mtu) {
        payloads.push(nal)
        continue
      }

      const payloadHeader = [(nal[0] & 0x81) | (H265_NAL_FU << 1), nal[1]]
      const fragments = chunk(nal.subarray(2), this.mtu - 3)
      fragments.forEach((fragment, index) => {
        let fuHeader = nalType
        if (index === 0) fuHeader |= 0x80
        if (index === fragments.length - 1) fuHeader |= 0x40
        payloads.push(Buffer.concat([Buffer.from([...payloadHeader, fuHeader]), fragment]))
      })
    }
    return payloads
  }
}

/** RFC 7741 with the one-byte descriptor; S is set on the first packet of a frame. */
export class Vp8Payloader implements Payloader {
  constructor(private readonly mtu = DEFAULT_RTP_MTU) {}

  payload(frame: Buffer): Buffer[] {
    return chunk(frame, this.mtu - 1).map((fragment, index) =>
      Buffer.concat([Buffer.from([index === 0 ? 0x10 : 0x00]), fragment]),
    )
  }
}

/**
 * VP9 flexible mode with a 15-bit picture id: I and F always, B on the first
 * packet of a frame, E on the last.
 */
export class Vp9Payloader implements Payloader {
  private pictureId: number

  constructor(
    private readonly mtu = DEFAULT_RTP_MTU,
    initialPictureId: number = randomInt(0x8000),
  ) {
    this.pictureId = initialPictureId & 0x7fff
  }

  payload(frame: Buffer): Buffer[] {
    const fragments = chunk(frame, this.mtu - 3)
    const pictureId = this.pictureId
    this.pictureId = (this.pictureId + 1) & 0x7fff

    return fragments.map((fragment, index) => {
      let flags = 0x90
      if (index === 0) flags |= 0x08
      if (index === fragments.length - 1) flags |= 0x04
      const descriptor = Buffer.from([flags, 0x80 | (pictureId >> 8), pictureId & 0xff])
      return Buffer.concat([descriptor, fragment])
    })
  }
}

export function createPayloader(codec: VideoCodec, mtu = DEFAULT_RTP_MTU): Payloader {
  switch (codec) {
    case 'h264':
      return new H264Payloader(mtu)
    case 'h265':
      return new H265Payloader(mtu)
    case 'vp8':
      return new Vp8Payloader(mtu)
    case 'vp9':
      return new Vp9Payloader(mtu)
  }
}

export type RtpPacketFields = {
  sequenceNumber: number
  timestamp: number
  marker: boolean
  payload: Buffer
}

/**
 * Per-peer sequence numbers and 90 kHz timestamps. Each sample advances the
 * timestamp by its own duration.
 */
export class RtpSequencer {
  private sequenceNumber: number
  private timestamp: number
  private remainder = 0

  constructor(initialSequence: number = randomInt(0x10000), initialTimestamp: number = randomInt(0x100000000)) {
    this.sequenceNumber = initialSequence & 0xffff
    this.timestamp = initialTimestamp >>> 0
  }

  /** Stamp the payloads of one frame, then advance the clock by `durationNs`. */
  frame(payloads: Buffer[], durationNs: number): RtpPacketFields[] {
    const timestamp = this.timestamp
    const packets = payloads.map((payload, index) => {
      const packet = {
        sequenceNumber: this.sequenceNumber,
        timestamp,
        marker: index === payloads.length - 1,
        payload,
      }
      this.sequenceNumber = (this.sequenceNumber + 1) & 0xffff
      return packet
    })
    this.advance(durationNs)
    return packets
  }

  private advance(durationNs: number): void {
    const scaled = durationNs * VIDEO_CLOCK_RATE + this.remainder
    const ticks = Math.floor(scaled / 1e9)
    this.remainder = scaled - ticks * 1e9
    this.timestamp = (this.timestamp + ticks) >>> 0
  }
}
