import { logger } from '../logger.js'
import { InputFormatError } from '../errors.js'
import { codecFromIvfFourcc, type VideoCodec } from '../codec.js'
import { createSample } from '../peer-transport.js'
import { emptyStats, type SampleSink, type SourceStats } from './types.js'

const log = logger.child({ component: 'ivf-source' })

export const IVF_SIGNATURE = 'DKIF'
export const IVF_HEADER_SIZE = 32
export const IVF_FRAME_HEADER_SIZE = 12

export type IvfHeader = {
  fourcc: string
  codec: VideoCodec | null
  width: number
  height: number
  /** Seconds per pts unit is `timebaseNum / timebaseDen`. */
  timebaseNum: number
  timebaseDen: number
  frameCount: number
  headerSize: number
}

export function parseIvfHeader(data: Buffer): IvfHeader {
  if (data.length < IVF_HEADER_SIZE) {
    throw new InputFormatError(`IVF header needs ${IVF_HEADER_SIZE} bytes, got ${data.length}`)
  }
  const signature = data.toString('ascii', 0, 4)
  if (signature !== IVF_SIGNATURE) {
    throw new InputFormatError(`Not an IVF stream (signature "${signature}")`)
  }
  const fourcc = data.toString('ascii', 8, 12)
  const timebaseDen = data.readUInt32LE(16)
  const timebaseNum = data.readUInt32LE(20)
  if (timebaseDen === 0 || timebaseNum === 0) {
    throw new InputFormatError('IVF header has a zero timebase')
  }
  return {
    fourcc,
    codec: codecFromIvfFourcc(fourcc),
    width: data.readUInt16LE(12),
    height: data.readUInt16LE(14),
    timebaseNum,
    timebaseDen,
    frameCount: data.readUInt32LE(24),
    headerSize: Math.max(IVF_HEADER_SIZE, data.readUInt16LE(6)),
  }
}

export type IvfSourceOptions = {
  /** Warn when the file's fourcc names a different codec than the sink sends. */
  expectedCodec?: VideoCodec
}

/**
 * Reads IVF frames and renders each one, waiting for `render()` to settle
 * before reading further, so a blocked sink holds back the input.
 */
export class IvfSource {
  private stopped = false
  private header: IvfHeader | null = null
  private previousPts: bigint | null = null

  constructor(
    private readonly input: AsyncIterable<Uint8Array>,
    private readonly sink: SampleSink,
    private readonly options: IvfSourceOptions = {},
  ) {}

  get ivfHeader(): IvfHeader | null {
    return this.header
  }

  stop(): void {
    this.stopped = true
  }

  async run(): Promise<SourceStats> {
    const stats = emptyStats()
    let buffered: Buffer = Buffer.alloc(0)

    try {
      for await (const chunk of this.input) {
        const bytes = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)
        buffered = buffered.length > 0 ? Buffer.concat([buffered, bytes]) : bytes

        if (!this.header) {
          if (buffered.length < IVF_HEADER_SIZE) continue
          const header = parseIvfHeader(buffered)
          if (buffered.length < header.headerSize) continue
          this.acceptHeader(header)
          buffered = buffered.subarray(header.headerSize)
        }

        while (buffered.length >= IVF_FRAME_HEADER_SIZE) {
          const size = buffered.readUInt32LE(0)
          if (buffered.length < IVF_FRAME_HEADER_SIZE + size) break
          const pts = buffered.readBigUInt64LE(4)
          const frame = Buffer.from(buffered.subarray(IVF_FRAME_HEADER_SIZE, IVF_FRAME_HEADER_SIZE + size))
          buffered = buffered.subarray(IVF_FRAME_HEADER_SIZE + size)

          stats.frames += 1
          const outcome = await this.sink.render(createSample(frame, this.durationFor(pts)))
          if (outcome === 'delivered') stats.delivered += 1
          if (outcome === 'dropped') stats.dropped += 1
          if (outcome === 'shutdown') {
            stats.endedBy = 'shutdown'
            return stats
          }
          if (this.stopped) {
            stats.endedBy = 'stopped'
            return stats
          }
        }
        if (this.stopped) {
          stats.endedBy = 'stopped'
          return stats
        }
      }
    } catch (err) {
      // Destroying the input to stop it rejects the pending read.
      if (!this.stopped) throw err
      log.debug({ err }, 'IVF input closed while stopping')
    }
    if (this.stopped) {
      stats.endedBy = 'stopped'
      return stats
    }

    if (!this.header) {
      throw new InputFormatError('IVF stream ended before its header')
    }
    if (buffered.length > 0) {
      log.warn({ trailingBytes: buffered.length }, 'IVF stream ended inside a frame')
    }
    log.info({ frames: stats.frames, delivered: stats.delivered, dropped: stats.dropped }, 'IVF input finished')
    return stats
  }

  private acceptHeader(header: IvfHeader): void {
    this.header = header
    log.info(
      { fourcc: header.fourcc, width: header.width, height: header.height, frames: header.frameCount },
      'IVF stream opened',
    )
    const expected = this.options.expectedCodec
    if (expected && header.codec !== expected) {
      log.warn({ fourcc: header.fourcc, expected }, 'IVF codec does not match the configured codec')
    }
  }

  /** Duration from the pts delta to the previous frame; one timebase unit for the first. */
  private durationFor(pts: bigint): number | undefined {
    const header = this.header
    if (!header) return undefined
    const previous = this.previousPts
    this.previousPts = pts
    const units = previous !== null && pts > previous ? Number(pts - previous) : 1
    return (units * header.timebaseNum * 1e9) / header.timebaseDen
  }
}
