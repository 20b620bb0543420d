import { Router } from 'express'
import { logger } from './logger.js'
import { LiveSinkError, describeError, httpStatusForError } from './errors.js'
import {
  SessionIdSchema,
  SessionRequestSchema,
  type ErrorResponse,
  type SessionListResponse,
  type SessionResponse,
} from '../shared/session-protocol.js'
import type { WebSink } from './web-sink.js'

const log = logger.child({ component: 'session-router' })

export interface SessionRouterDeps {
  sink: Pick<WebSink, 'admit' | 'sessions' | 'disconnect'>
}

export function createSessionRouter(deps: SessionRouterDeps): Router {
  const { sink } = deps
  const router = Router()

  router.post('/session', async (req, res) => {
    const parsed = SessionRequestSchema.safeParse(req.body || {})
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', details: parsed.error.issues })
      return
    }

    try {
      const result = await sink.admit(parsed.data.offer)
      const body: SessionResponse = {
        answer: { type: 'answer', sdp: result.answer.sdp },
        sessionId: result.sessionId,
        negotiatedCodec: result.negotiatedCodec,
      }
      res.json(body)
    } catch (err) {
      const status = httpStatusForError(err)
      const body: ErrorResponse = { error: describeError(err) }
      if (err instanceof LiveSinkError) {
        body.code = err.code
        if (err.cause !== undefined) body.details = describeError(err.cause)
      }
      log.error({ err, status }, 'Failed to create session')
      res.status(status).json(body)
    }
  })

  router.get('/sessions', (_req, res) => {
    const sessions = sink.sessions().map(({ closed: _closed, ...summary }) => summary)
    const body: SessionListResponse = { sessions, count: sessions.length }
    res.json(body)
  })

  router.delete('/session/:sessionId', (req, res) => {
    const parsed = SessionIdSchema.safeParse(req.params.sessionId)
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid session id' })
      return
    }
    if (!sink.disconnect(parsed.data)) {
      res.status(404).json({ error: 'Session not found' })
      return
    }
    log.info({ sessionId: parsed.data }, 'Session closed by client')
    res.json({ ok: true })
  })

  return router
}
