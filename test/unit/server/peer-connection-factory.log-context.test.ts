import { describe, it, expect, vi, beforeEach } from 'vitest'

const captured = vi.hoisted(() => {
  const entries: Record<string, unknown>[] = []
  return { entries }
})

vi.mock('../../../server/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../server/logger.js')>()
  const stream = {
    write(chunk: string) {
      const line = chunk.toString().trim()
      if (line) captured.entries.push(JSON.parse(line))
    },
  }
  return { ...actual, logger: actual.createLogger(stream) }
})

import { PeerConnectionFactory } from '../../../server/peer-connection-factory.js'
import { SessionRegistry } from '../../../server/session-registry.js'
import { DistributionTrack } from '../../../server/distribution-track.js'
import { UnblockSignal } from '../../../server/unblock-signal.js'
import { withLogContext } from '../../../server/logger.js'
import { FakeTransportFactory, offer, sequentialIds } from '../../helpers/fake-transport.js'

function setup() {
  const registry = new SessionRegistry(new UnblockSignal())
  const track = new DistributionTrack(registry, { codec: 'h264', mode: 'sample' })
  const transports = new FakeTransportFactory()
  const factory = new PeerConnectionFactory({ registry, track, transports, createId: sequentialIds() })
  return { registry, transports, factory }
}

function entry(msg: string): Record<string, unknown> | undefined {
  return captured.entries.find((e) => e.msg === msg)
}

describe('PeerConnectionFactory log context', () => {
  beforeEach(() => {
    captured.entries.length = 0
  })

  it('stamps admission logs with the session id and the enclosing request id', async () => {
    const { factory } = setup()

    await withLogContext({ requestId: 'req-1' }, () => factory.admit(offer()))

    expect(entry('Created new peer connection')).toMatchObject({ sessionId: 'peer-1', requestId: 'req-1' })
    expect(entry('WebRTC session established')).toMatchObject({
      sessionId: 'peer-1',
      requestId: 'req-1',
      codec: 'video/h264',
    })
  })

  it('stamps state-change logs with the session id of the peer that changed', async () => {
    const { factory, transports, registry } = setup()
    await factory.admit(offer())
    await factory.admit(offer())

    transports.created[1].emitState('failed')

    expect(registry.has('peer-2')).toBe(false)
    expect(entry('Peer disconnected, cleaning up')).toMatchObject({ sessionId: 'peer-2', state: 'failed' })
  })
})
