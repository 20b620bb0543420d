import { describe, it, expect } from 'vitest'
import {
  codecFromCaps,
  codecFromIvfFourcc,
  codecMimeType,
  codecName,
  isUnsupportedCodecError,
} from '../../../server/codec.js'

describe('codec', () => {
  it('maps codecs to WebRTC mime types and display names', () => {
    expect(codecMimeType('h264')).toBe('video/H264')
    expect(codecMimeType('h265')).toBe('video/H265')
    expect(codecMimeType('vp8')).toBe('video/VP8')
    expect(codecMimeType('vp9')).toBe('video/VP9')
    expect(codecName('h265')).toBe('H.265/HEVC')
  })

  describe('codecFromCaps', () => {
    it('detects encoded-frame caps as sample mode', () => {
      expect(codecFromCaps('video/x-h264, stream-format=byte-stream, alignment=au')).toEqual({
        codec: 'h264',
        mode: 'sample',
      })
      expect(codecFromCaps('video/x-vp9')).toEqual({ codec: 'vp9', mode: 'sample' })
    })

    it('detects RTP caps by encoding name', () => {
      expect(codecFromCaps('application/x-rtp, media=video, encoding-name="VP8", payload=96')).toEqual({
        codec: 'vp8',
        mode: 'rtp',
      })
      expect(codecFromCaps('application/x-rtp, encoding-name=h265')).toEqual({ codec: 'h265', mode: 'rtp' })
    })

    it('returns null for anything else', () => {
      expect(codecFromCaps('video/x-raw, format=I420')).toBeNull()
      expect(codecFromCaps('application/x-rtp, media=video')).toBeNull()
      expect(codecFromCaps('application/x-rtp, encoding-name=AV1')).toBeNull()
    })
  })

  it('maps IVF fourcc codes', () => {
    expect(codecFromIvfFourcc('VP80')).toBe('vp8')
    expect(codecFromIvfFourcc('VP90')).toBe('vp9')
    expect(codecFromIvfFourcc('H264')).toBe('h264')
    expect(codecFromIvfFourcc('AV01')).toBeNull()
  })

  it('recognizes codec rejections from the WebRTC stack', () => {
    expect(isUnsupportedCodecError(new Error('video/H265 codec not supported by the remote peer'))).toBe(true)
    expect(isUnsupportedCodecError('No matching codec found')).toBe(true)
    expect(isUnsupportedCodecError(new Error('ICE failed'))).toBe(false)
  })
})
