// @vitest-environment node
import { describe, it, expect, vi, beforeEach } from 'vitest'
import express from 'express'
import request from 'supertest'

const mockState = vi.hoisted(() => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }

  return {
    logger,
    withLogContext: vi.fn(<T>(_ctx: unknown, fn: () => T): T => fn()),
  }
})

vi.mock('../../../server/logger.js', () => ({
  logger: mockState.logger,
  withLogContext: mockState.withLogContext,
}))

import { createRequestLogger } from '../../../server/request-logger.js'

function createTestApp(slowMs: number) {
  const app = express()
  app.use(createRequestLogger({ slowMs }))
  app.get('/ok', (_req, res) => {
    res.json({ ok: true })
  })
  app.get('/missing', (_req, res) => {
    res.status(404).json({ error: 'nope' })
  })
  app.get('/broken', (_req, res) => {
    res.status(500).json({ error: 'boom' })
  })
  return app
}

describe('requestLogger', () => {
  beforeEach(() => {
    mockState.logger.info.mockClear()
    mockState.logger.warn.mockClear()
    mockState.logger.error.mockClear()
    mockState.withLogContext.mockClear()
  })

  it('echoes a supplied request id', async () => {
    const res = await request(createTestApp(60_000)).get('/ok').set('x-request-id', 'req-abc')

    expect(res.headers['x-request-id']).toBe('req-abc')
    expect(mockState.withLogContext).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-abc', requestMethod: 'GET', requestPath: '/ok' }),
      expect.any(Function),
    )
  })

  it('generates a request id when none is supplied', async () => {
    const res = await request(createTestApp(60_000)).get('/ok')

    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('logs at a level matching the status code', async () => {
    const app = createTestApp(60_000)
    await request(app).get('/ok')
    await request(app).get('/missing')
    await request(app).get('/broken')

    expect(mockState.logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'http_request', statusCode: 200 }),
      'HTTP request',
    )
    expect(mockState.logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'http_request', statusCode: 404 }),
      'HTTP request',
    )
    expect(mockState.logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'http_request', statusCode: 500 }),
      'HTTP request',
    )
  })

  it('warns about requests slower than the threshold', async () => {
    await request(createTestApp(0)).get('/ok')

    expect(mockState.logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'http_request_slow', method: 'GET', path: '/ok', statusCode: 200 }),
      'Slow HTTP request',
    )
  })

  it('does not warn about fast requests', async () => {
    await request(createTestApp(60_000)).get('/ok')

    expect(mockState.logger.warn).not.toHaveBeenCalled()
  })
})
