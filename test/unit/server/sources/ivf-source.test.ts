import { describe, it, expect, vi } from 'vitest'
import { PassThrough } from 'stream'

vi.mock('../../../../server/logger.js', async () => (await import('../../../helpers/mock-logger.js')).mockLoggerModule())

import { IvfSource, parseIvfHeader } from '../../../../server/sources/ivf-source.js'
import { InputFormatError } from '../../../../server/errors.js'
import type { MediaSample } from '../../../../server/peer-transport.js'
import type { RenderOutcome } from '../../../../server/render-gate.js'
import { deferred, flushAsync } from '../../../helpers/fake-transport.js'

function ivfHeader(options: { fourcc?: string; rate?: number; scale?: number; frames?: number } = {}): Buffer {
  const header = Buffer.alloc(32)
  header.write('DKIF', 0, 'ascii')
  header.writeUInt16LE(0, 4)
  header.writeUInt16LE(32, 6)
  header.write(options.fourcc ?? 'VP80', 8, 'ascii')
  header.writeUInt16LE(640, 12)
  header.writeUInt16LE(480, 14)
  header.writeUInt32LE(options.rate ?? 1000, 16)
  header.writeUInt32LE(options.scale ?? 1, 20)
  header.writeUInt32LE(options.frames ?? 0, 24)
  return header
}

function ivfFrame(pts: number, data: number[]): Buffer {
  const frameHeader = Buffer.alloc(12)
  frameHeader.writeUInt32LE(data.length, 0)
  frameHeader.writeBigUInt64LE(BigInt(pts), 4)
  return Buffer.concat([frameHeader, Buffer.from(data)])
}

async function* chunks(...parts: Buffer[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield part
}

function recordingSink(outcome: RenderOutcome = 'delivered') {
  const samples: MediaSample[] = []
  const sink = {
    render: vi.fn(async (sample: MediaSample): Promise<RenderOutcome> => {
      samples.push(sample)
      return outcome
    }),
  }
  return { sink, samples }
}

describe('parseIvfHeader', () => {
  it('reads the header fields', () => {
    expect(parseIvfHeader(ivfHeader({ fourcc: 'VP90', rate: 30, scale: 1, frames: 9 }))).toEqual({
      fourcc: 'VP90',
      codec: 'vp9',
      width: 640,
      height: 480,
      timebaseNum: 1,
      timebaseDen: 30,
      frameCount: 9,
      headerSize: 32,
    })
  })

  it('rejects data without the IVF signature', () => {
    const header = ivfHeader()
    header.write('RIFF', 0, 'ascii')

    expect(() => parseIvfHeader(header)).toThrow(InputFormatError)
    expect(() => parseIvfHeader(header)).toThrow('Not an IVF stream (signature "RIFF")')
  })

  it('rejects a zero timebase', () => {
    expect(() => parseIvfHeader(ivfHeader({ rate: 0 }))).toThrow('IVF header has a zero timebase')
  })
})

describe('IvfSource', () => {
  it('renders every frame in order with durations from the pts deltas', async () => {
    const { sink, samples } = recordingSink()
    const stream = Buffer.concat([ivfHeader(), ivfFrame(0, [1]), ivfFrame(40, [2, 2]), ivfFrame(80, [3])])
    // Cut through the header and a frame header to exercise reassembly.
    const source = new IvfSource(chunks(stream.subarray(0, 20), stream.subarray(20, 50), stream.subarray(50)), sink)

    const stats = await source.run()

    expect(samples.map((sample) => Array.from(sample.data))).toEqual([[1], [2, 2], [3]])
    expect(samples.map((sample) => sample.durationNs)).toEqual([1_000_000, 40_000_000, 40_000_000])
    expect(stats).toEqual({ frames: 3, delivered: 3, dropped: 0, endedBy: 'eof' })
    expect(source.ivfHeader?.codec).toBe('vp8')
  })

  it('counts frames the sink dropped', async () => {
    const { sink } = recordingSink('dropped')
    const source = new IvfSource(chunks(ivfHeader(), ivfFrame(0, [1]), ivfFrame(1, [2])), sink)

    await expect(source.run()).resolves.toEqual({ frames: 2, delivered: 0, dropped: 2, endedBy: 'eof' })
  })

  it('does not read ahead while a render is pending', async () => {
    let pulled = 0
    async function* counted(): AsyncGenerator<Uint8Array> {
      pulled += 1
      yield Buffer.concat([ivfHeader(), ivfFrame(0, [1])])
      pulled += 1
      yield ivfFrame(1, [2])
    }
    const release = deferred<RenderOutcome>()
    const sink = {
      render: vi.fn(async (): Promise<RenderOutcome> => release.promise),
    }
    const source = new IvfSource(counted(), sink)

    const running = source.run()
    await flushAsync()
    expect(pulled).toBe(1)
    expect(sink.render).toHaveBeenCalledTimes(1)

    release.resolve('delivered')
    await running

    expect(pulled).toBe(2)
    expect(sink.render).toHaveBeenCalledTimes(2)
  })

  it('stops when the sink shuts down', async () => {
    const { sink } = recordingSink('shutdown')
    const source = new IvfSource(chunks(ivfHeader(), ivfFrame(0, [1]), ivfFrame(1, [2])), sink)

    await expect(source.run()).resolves.toEqual({ frames: 1, delivered: 0, dropped: 0, endedBy: 'shutdown' })
    expect(sink.render).toHaveBeenCalledTimes(1)
  })

  it('stops after the current frame when asked to', async () => {
    const { sink } = recordingSink()
    const source = new IvfSource(chunks(ivfHeader(), ivfFrame(0, [1]), ivfFrame(1, [2])), sink)
    sink.render.mockImplementationOnce(async (): Promise<RenderOutcome> => {
      source.stop()
      return 'delivered'
    })

    await expect(source.run()).resolves.toEqual({ frames: 1, delivered: 1, dropped: 0, endedBy: 'stopped' })
  })

  it('fails when the stream ends before the header', async () => {
    const { sink } = recordingSink()
    const source = new IvfSource(chunks(Buffer.from('DKIF')), sink)

    await expect(source.run()).rejects.toThrow('IVF stream ended before its header')
  })

  it('ignores a truncated final frame', async () => {
    const { sink } = recordingSink()
    const truncated = ivfFrame(1, [9, 9, 9, 9]).subarray(0, 14)
    const source = new IvfSource(chunks(ivfHeader(), ivfFrame(0, [1]), truncated), sink)

    await expect(source.run()).resolves.toEqual({ frames: 1, delivered: 1, dropped: 0, endedBy: 'eof' })
  })

  it('ends as stopped when its input is destroyed during shutdown', async () => {
    const { sink } = recordingSink()
    const input = new PassThrough()
    const source = new IvfSource(input, sink)
    const result = source.run()

    input.write(Buffer.concat([ivfHeader(), ivfFrame(0, [1])]))
    await flushAsync()
    expect(sink.render).toHaveBeenCalledTimes(1)

    source.stop()
    input.destroy()

    await expect(result).resolves.toEqual({ frames: 1, delivered: 1, dropped: 0, endedBy: 'stopped' })
  })

  it('still fails on an input error it did not cause', async () => {
    const { sink } = recordingSink()
    const input = new PassThrough()
    const source = new IvfSource(input, sink)
    const result = source.run()

    input.write(ivfHeader())
    await flushAsync()
    input.destroy(new Error('read failed'))

    await expect(result).rejects.toThrow('read failed')
  })
})
