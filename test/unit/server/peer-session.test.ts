import { describe, it, expect, vi } from 'vitest'

vi.mock('../../../server/logger.js', async () => (await import('../../helpers/mock-logger.js')).mockLoggerModule())

import { PeerSession } from '../../../server/peer-session.js'
import { createSample } from '../../../server/peer-transport.js'
import { FakeTransport, deferred, flushAsync } from '../../helpers/fake-transport.js'

function createTransport() {
  return new FakeTransport({
    track: { codec: 'vp8', mode: 'sample', trackId: 'video', streamId: 'livesink' },
    iceServers: [],
  })
}

describe('PeerSession', () => {
  it('hands the first sample to the transport without waiting', () => {
    const transport = createTransport()
    const session = new PeerSession('peer-1', transport)
    const sample = createSample(Buffer.from([1, 2, 3]))

    session.deliver(sample)

    expect(transport.written).toEqual([sample])
  })

  it('writes queued samples in order once the transport catches up', async () => {
    const transport = createTransport()
    const gate = deferred()
    transport.writeGate = gate.promise
    const session = new PeerSession('peer-1', transport)
    const samples = [1, 2, 3].map((n) => createSample(Buffer.from([n])))

    for (const sample of samples) session.deliver(sample)
    expect(transport.written).toEqual([])

    gate.resolve()
    await flushAsync()

    expect(transport.written).toEqual(samples)
    expect(session.info().deliveredSamples).toBe(3)
  })

  it('drops the oldest pending samples for a slow peer', async () => {
    const transport = createTransport()
    const gate = deferred()
    transport.writeGate = gate.promise
    const session = new PeerSession('peer-1', transport, 10)
    const first = createSample(Buffer.alloc(6, 1))
    const second = createSample(Buffer.alloc(6, 2))
    const third = createSample(Buffer.alloc(6, 3))

    session.deliver(first)
    session.deliver(second)
    session.deliver(third)

    gate.resolve()
    await flushAsync()

    expect(transport.written).toEqual([first, third])
    expect(session.info().droppedSamples).toBe(1)
  })

  it('counts failed writes and keeps delivering', async () => {
    const transport = createTransport()
    transport.writeError = new Error('socket gone')
    const session = new PeerSession('peer-1', transport)

    session.deliver(createSample(Buffer.from([1])))
    await flushAsync()
    transport.writeError = null
    const next = createSample(Buffer.from([2]))
    session.deliver(next)
    await flushAsync()

    expect(session.info().deliveryFailures).toBe(1)
    expect(transport.written).toEqual([next])
  })

  it('reports transport state changes to its observer', () => {
    const transport = createTransport()
    const session = new PeerSession('peer-1', transport)
    const listener = vi.fn()
    session.observe(listener)

    transport.emitState('connected')

    expect(listener).toHaveBeenCalledWith(session, 'connected')
    expect(session.connectionState).toBe('connected')
  })

  it('closes the transport once however often close is called', async () => {
    const transport = createTransport()
    const session = new PeerSession('peer-1', transport)
    session.observe(vi.fn())

    await Promise.all([session.close(), session.close()])
    await session.close()

    expect(transport.closeCalls).toBe(1)
    expect(session.isClosed).toBe(true)
    expect(session.connectionState).toBe('closed')
    expect(transport.listenerCount()).toBe(0)
  })

  it('ignores samples after close', async () => {
    const transport = createTransport()
    const session = new PeerSession('peer-1', transport)
    await session.close()

    session.deliver(createSample(Buffer.from([1])))
    await flushAsync()

    expect(transport.written).toEqual([])
  })

  it('describes itself', () => {
    const session = new PeerSession('peer-7', createTransport())

    expect(session.info()).toEqual({
      sessionId: 'peer-7',
      connectionState: 'new',
      createdAt: session.createdAt,
      deliveredSamples: 0,
      droppedSamples: 0,
      deliveryFailures: 0,
      closed: false,
    })
  })
})
