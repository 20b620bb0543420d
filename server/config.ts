import fs from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import type { LevelWithSilent } from 'pino'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { StreamModeSchema, VideoCodecSchema, type StreamMode, type VideoCodec } from './codec.js'
import { DEFAULT_PEER_QUEUE_MAX_BYTES } from './peer-outbound-queue.js'
import type { IceServer } from './peer-transport.js'
import type { PendingSamplePolicy } from './render-gate.js'

export const DEFAULT_PORT = 8091
export const DEFAULT_PORT_SEARCH_LIMIT = 100
export const DEFAULT_STUN_SERVER = 'stun:stun.l.google.com:19302'
export const DEFAULT_HTTP_SLOW_MS = 500
export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const satisfies readonly LevelWithSilent[]
export type LogLevel = (typeof LOG_LEVELS)[number]

export type InputSpec =
  | { kind: 'stdin' }
  | { kind: 'file'; path: string }
  | { kind: 'udp'; host: string; port: number }

export type AppConfig = {
  port: number
  bindAddress: string
  portSearchLimit: number
  iceServers: IceServer[]
  isLive: boolean
  codec: VideoCodec
  mode: StreamMode
  negotiationTimeoutMs: number
  pendingSamplePolicy: PendingSamplePolicy
  peerQueueMaxBytes: number
  input: InputSpec
  staticDir: string
  httpSlowMs: number
  logLevel: LogLevel
  logFilePath: string | null
}

/** `public/` beside package.json, found from both `server/` and `dist/server/`. */
function defaultStaticDir(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url))
  while (dir !== path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return path.join(dir, 'public')
    dir = path.dirname(dir)
  }
  return path.resolve('public')
}

const booleanFromEnv = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value, ctx) => {
    if (['1', 'true', 'yes', 'on'].includes(value)) return true
    if (['0', 'false', 'no', 'off', ''].includes(value)) return false
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` })
    return z.NEVER
  })

const intFromEnv = (min: number, max: number) => z.coerce.number().int().min(min).max(max)

/** `-` reads IVF from stdin, `udp://host:port` listens for RTP, anything else is an IVF file path. */
export function parseInput(raw: string): InputSpec {
  const value = raw.trim()
  if (value === '' || value === '-') return { kind: 'stdin' }
  if (value.startsWith('udp://')) {
    let url: URL
    try {
      url = new URL(value)
    } catch {
      throw new ConfigError('Invalid INPUT', [`"${value}" is not a valid udp:// address`])
    }
    const port = Number(url.port)
    if (!url.port || !Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError('Invalid INPUT', [`"${value}" needs a port between 1 and 65535`])
    }
    const host = url.hostname.replace(/^\[|\]$/g, '') || '0.0.0.0'
    return { kind: 'udp', host, port }
  }
  return { kind: 'file', path: value }
}

const EnvSchema = z.object({
  PORT: intFromEnv(0, 65535).default(DEFAULT_PORT),
  BIND_ADDRESS: z.string().trim().min(1).default('0.0.0.0'),
  PORT_SEARCH_LIMIT: intFromEnv(1, 1000).default(DEFAULT_PORT_SEARCH_LIMIT),
  STUN_SERVER: z.string().trim().default(DEFAULT_STUN_SERVER),
  IS_LIVE: booleanFromEnv.default('false'),
  VIDEO_CODEC: z.string().trim().toLowerCase().pipe(VideoCodecSchema).default('h264'),
  STREAM_MODE: z.string().trim().toLowerCase().pipe(StreamModeSchema).default('sample'),
  NEGOTIATION_TIMEOUT_MS: intFromEnv(0, 600_000).default(0),
  PENDING_SAMPLE_POLICY: z.enum(['discard', 'deliver']).default('discard'),
  PEER_QUEUE_MAX_BYTES: intFromEnv(1024, 1024 * 1024 * 1024).default(DEFAULT_PEER_QUEUE_MAX_BYTES),
  INPUT: z.string().default('-'),
  STATIC_DIR: z.string().trim().min(1).optional(),
  HTTP_SLOW_MS: intFromEnv(0, 600_000).default(DEFAULT_HTTP_SLOW_MS),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('debug'),
  LOG_DEBUG_PATH: z.string().trim().optional(),
})

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error))
  }
  const vars = parsed.data
  const input = parseInput(vars.INPUT)

  // Datagrams are whole RTP packets; IVF frames are encoded samples.
  if (input.kind === 'udp' && vars.STREAM_MODE !== 'rtp') {
    throw new ConfigError('Invalid configuration', ['INPUT: udp:// input requires STREAM_MODE=rtp'])
  }
  if (input.kind !== 'udp' && vars.STREAM_MODE !== 'sample') {
    throw new ConfigError('Invalid configuration', ['INPUT: IVF input requires STREAM_MODE=sample'])
  }

  return {
    port: vars.PORT,
    bindAddress: vars.BIND_ADDRESS,
    portSearchLimit: vars.PORT_SEARCH_LIMIT,
    iceServers: vars.STUN_SERVER ? [{ urls: vars.STUN_SERVER }] : [],
    isLive: vars.IS_LIVE,
    codec: vars.VIDEO_CODEC,
    mode: vars.STREAM_MODE,
    negotiationTimeoutMs: vars.NEGOTIATION_TIMEOUT_MS,
    pendingSamplePolicy: vars.PENDING_SAMPLE_POLICY,
    peerQueueMaxBytes: vars.PEER_QUEUE_MAX_BYTES,
    input,
    staticDir: vars.STATIC_DIR ?? defaultStaticDir(),
    httpSlowMs: vars.HTTP_SLOW_MS,
    logLevel: vars.LOG_LEVEL,
    logFilePath: vars.LOG_DEBUG_PATH ? path.resolve(vars.LOG_DEBUG_PATH) : null,
  }
}
