import express, { type Express } from 'express'
import fs from 'fs'
import http from 'http'
import net from 'net'
import os from 'os'
import path from 'path'
import rateLimit from 'express-rate-limit'
import { logger, appVersion } from './logger.js'
import { createRequestLogger } from './request-logger.js'
import { createSessionRouter } from './session-router.js'
import { codecName } from './codec.js'
import type { HealthResponse } from '../shared/session-protocol.js'
import type { WebSink } from './web-sink.js'

const log = logger.child({ component: 'http-server' })

export type AppDeps = {
  sink: Pick<WebSink, 'admit' | 'sessions' | 'disconnect' | 'state' | 'isLive' | 'codec' | 'peerCount'>
  staticDir?: string
  httpSlowMs?: number
  rateLimitPerMinute?: number
}

export function createApp(deps: AppDeps): Express {
  const { sink } = deps
  const app = express()
  app.disable('x-powered-by')

  app.use(express.json({ limit: '1mb' }))
  app.use(createRequestLogger({ slowMs: deps.httpSlowMs }))

  app.get('/api/health', (_req, res) => {
    const body: HealthResponse = {
      app: 'livesink',
      ok: true,
      version: appVersion,
      started: sink.state === 'started',
      live: sink.isLive,
      codec: codecName(sink.codec),
      peers: sink.peerCount(),
    }
    res.json(body)
  })

  app.use(
    '/api',
    rateLimit({
      windowMs: 60_000,
      max: deps.rateLimitPerMinute ?? 300,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  )
  app.use('/api', createSessionRouter({ sink }))

  const staticDir = deps.staticDir
  if (staticDir) {
    const indexHtml = path.join(staticDir, 'index.html')
    if (fs.existsSync(indexHtml)) {
      app.use(express.static(staticDir, { index: false }))
      app.get('*', (_req, res) => res.sendFile(indexHtml))
    } else {
      log.warn({ staticDir }, 'Viewer page not found, serving API only')
    }
  }

  return app
}

function isPortFree(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const candidate = net.createServer()
    candidate.once('error', () => resolve(false))
    candidate.once('listening', () => {
      candidate.close(() => resolve(true))
    })
    candidate.listen(port, host)
  })
}

/**
 * Port 0 asks the OS for any free port. Otherwise the first free port in
 * `[start, start + limit)` wins.
 */
export async function findAvailablePort(start: number, host: string, limit: number): Promise<number> {
  if (start === 0) return 0
  for (let offset = 0; offset < limit; offset += 1) {
    const candidate = start + offset
    if (candidate > 65535) break
    if (await isPortFree(candidate, host)) return candidate
    log.debug({ port: candidate }, 'Port in use, trying next')
  }
  throw new Error(`No free port in range ${start}-${Math.min(start + limit - 1, 65535)}`)
}

export function listen(app: Express, port: number, host: string): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app)
    server.once('error', reject)
    server.listen(port, host, () => {
      server.off('error', reject)
      resolve(server)
    })
  })
}

export function scoreLanIp(ip: string, netmask: string): number {
  const parts = ip.split('.').map(Number)

  // Docker bridge
  if (ip.startsWith('172.17.')) return 0

  // VPN-style /32 addresses
  if (netmask === '255.255.255.255') return 1

  if (parts[0] === 192 && parts[1] === 168) return 100

  if (parts[0] === 10) {
    if (parts[1] <= 10) return 90
    return 50
  }

  if (parts[0] === 172 && parts[1] >= 16 && parts[1] <= 31) return 80

  return 10
}

type InterfaceMap = NodeJS.Dict<os.NetworkInterfaceInfo[]>

/** Non-loopback IPv4 addresses, most LAN-like first. */
export function detectLanIps(interfaces: InterfaceMap = os.networkInterfaces()): string[] {
  const ips: Array<{ address: string; netmask: string }> = []
  for (const addrs of Object.values(interfaces)) {
    if (!addrs) continue
    for (const addr of addrs) {
      if (addr.family === 'IPv4' && !addr.internal) {
        ips.push({ address: addr.address, netmask: addr.netmask })
      }
    }
  }
  ips.sort((a, b) => scoreLanIp(b.address, b.netmask) - scoreLanIp(a.address, a.netmask))
  return ips.map((ip) => ip.address)
}

export function startupUrls(port: number, hostname: string = os.hostname(), lanIps: string[] = detectLanIps()): string[] {
  const urls: string[] = []
  if (hostname) {
    const mdnsName = hostname.endsWith('.local') ? hostname : `${hostname}.local`
    urls.push(`http://${mdnsName}:${port}`)
  }
  for (const ip of lanIps) urls.push(`http://${ip}:${port}`)
  if (urls.length === 0) urls.push(`http://localhost:${port}`)
  return urls
}
