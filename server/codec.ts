import { z } from 'zod'

export const VideoCodecSchema = z.enum(['h264', 'h265', 'vp8', 'vp9'])
export type VideoCodec = z.infer<typeof VideoCodecSchema>

export const StreamModeSchema = z.enum(['sample', 'rtp'])
/** `sample`: one encoded frame per write. `rtp`: one complete RTP packet per write. */
export type StreamMode = z.infer<typeof StreamModeSchema>

type CodecSpec = {
  name: string
  mimeType: string
  capsName: string
  encodingName: string
  ivfFourcc?: string
  fmtp?: string
}

export const VIDEO_CODECS: Record<VideoCodec, CodecSpec> = {
  h264: {
    name: 'H.264',
    mimeType: 'video/H264',
    capsName: 'video/x-h264',
    encodingName: 'H264',
    ivfFourcc: 'H264',
    fmtp: 'level-asymmetry-allowed=1;packetization-mode=1;profile-level-id=42e01f',
  },
  h265: {
    name: 'H.265/HEVC',
    mimeType: 'video/H265',
    capsName: 'video/x-h265',
    encodingName: 'H265',
    ivfFourcc: 'H265',
  },
  vp8: {
    name: 'VP8',
    mimeType: 'video/VP8',
    capsName: 'video/x-vp8',
    encodingName: 'VP8',
    ivfFourcc: 'VP80',
  },
  vp9: {
    name: 'VP9',
    mimeType: 'video/VP9',
    capsName: 'video/x-vp9',
    encodingName: 'VP9',
    ivfFourcc: 'VP90',
  },
}

export const VIDEO_CLOCK_RATE = 90_000

export function codecName(codec: VideoCodec): string {
  return VIDEO_CODECS[codec].name
}

export function codecMimeType(codec: VideoCodec): string {
  return VIDEO_CODECS[codec].mimeType
}

function findCodec(predicate: (spec: CodecSpec) => boolean): VideoCodec | null {
  for (const codec of VideoCodecSchema.options) {
    if (predicate(VIDEO_CODECS[codec])) return codec
  }
  return null
}

/**
 * Detect codec and stream mode from a caps description such as
 * `video/x-h264, stream-format=byte-stream` or
 * `application/x-rtp, media=video, encoding-name=VP8`.
 */
export function codecFromCaps(caps: string): { codec: VideoCodec; mode: StreamMode } | null {
  const [rawName, ...rawFields] = caps.split(',')
  const name = rawName.trim().toLowerCase()

  if (name === 'application/x-rtp') {
    const fields = new Map<string, string>()
    for (const field of rawFields) {
      const eq = field.indexOf('=')
      if (eq === -1) continue
      fields.set(field.slice(0, eq).trim().toLowerCase(), field.slice(eq + 1).trim().replace(/^"|"$/g, ''))
    }
    const encodingName = fields.get('encoding-name')?.toUpperCase()
    if (!encodingName) return null
    const codec = findCodec((spec) => spec.encodingName === encodingName)
    return codec ? { codec, mode: 'rtp' } : null
  }

  const codec = findCodec((spec) => spec.capsName === name)
  return codec ? { codec, mode: 'sample' } : null
}

export function codecFromIvfFourcc(fourcc: string): VideoCodec | null {
  return findCodec((spec) => spec.ivfFourcc === fourcc)
}

export function isUnsupportedCodecError(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err)
  return /codec/i.test(message) && /not supported|unsupported|no matching/i.test(message)
}
