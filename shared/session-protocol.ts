/**
 * HTTP signaling protocol shared by the server and the viewer page.
 *
 * Browser→Server: Zod schemas (server validates) + inferred TypeScript types.
 * Server→Browser: TypeScript types only.
 */
import { z } from 'zod'

export const SessionOfferSchema = z.object({
  type: z.literal('offer'),
  sdp: z.string().min(1),
})

export const SessionRequestSchema = z.object({
  offer: SessionOfferSchema,
})

export type SessionRequest = z.infer<typeof SessionRequestSchema>

export const SessionIdSchema = z.string().min(1).max(64).regex(/^[A-Za-z0-9_-]+$/)

export type SessionAnswer = {
  type: 'answer'
  sdp: string
}

export type SessionResponse = {
  answer: SessionAnswer
  sessionId: string
  negotiatedCodec: string
}

export type SessionSummary = {
  sessionId: string
  connectionState: string
  createdAt: number
  deliveredSamples: number
  droppedSamples: number
  deliveryFailures: number
}

export type SessionListResponse = {
  sessions: SessionSummary[]
  count: number
}

export type HealthResponse = {
  app: string
  ok: boolean
  version: string | undefined
  started: boolean
  live: boolean
  codec: string
  peers: number
}

export type ErrorResponse = {
  error: string
  code?: string
  details?: unknown
}
