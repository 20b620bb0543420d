#!/usr/bin/env node
import 'dotenv/config'
import fs from 'fs'
import type { Readable } from 'stream'
import { logger, appVersion, configureLogging } from './logger.js'
import { loadConfig, type AppConfig } from './config.js'
import { codecName } from './codec.js'
import { createApp, findAvailablePort, listen, startupUrls } from './http-server.js'
import { WebSink } from './web-sink.js'
import { WeriftTransportFactory } from './werift-transport.js'
import { IvfSource } from './sources/ivf-source.js'
import { UdpRtpSource } from './sources/udp-rtp-source.js'
import type { SourceStats } from './sources/types.js'

const log = logger.child({ component: 'server' })

type RunningSource = {
  run: () => Promise<SourceStats>
  stop: () => void
}

async function openSource(config: AppConfig, sink: WebSink): Promise<RunningSource> {
  const { input } = config
  if (input.kind === 'udp') {
    const source = new UdpRtpSource(sink, { host: input.host, port: input.port })
    await source.listen()
    return source
  }

  const stream: Readable = input.kind === 'stdin' ? process.stdin : fs.createReadStream(input.path)
  const source = new IvfSource(stream, sink, { expectedCodec: config.codec })
  return {
    run: () => source.run(),
    stop: () => {
      source.stop()
      stream.destroy()
    },
  }
}

async function main() {
  const config = loadConfig()
  configureLogging({ level: config.logLevel, logFilePath: config.logFilePath })

  const sink = new WebSink({
    transports: new WeriftTransportFactory(),
    codec: config.codec,
    mode: config.mode,
    liveMode: config.isLive,
    pendingSamplePolicy: config.pendingSamplePolicy,
    iceServers: config.iceServers,
    negotiationTimeoutMs: config.negotiationTimeoutMs,
    peerQueueMaxBytes: config.peerQueueMaxBytes,
  })
  sink.activate()

  const app = createApp({ sink, staticDir: config.staticDir, httpSlowMs: config.httpSlowMs })
  const port = await findAvailablePort(config.port, config.bindAddress, config.portSearchLimit)
  const server = await listen(app, port, config.bindAddress)
  const address = server.address()
  const boundPort = typeof address === 'object' && address ? address.port : port
  log.info({ port: boundPort, appVersion }, 'Server listening')

  console.log('')
  console.log(`\x1b[32mlivesink is streaming ${codecName(config.codec)}\x1b[0m`)
  for (const url of startupUrls(boundPort)) {
    console.log(`   Open \x1b[36m${url}\x1b[0m`)
  }
  console.log('')

  const source = await openSource(config, sink)

  let isShuttingDown = false
  const shutdown = async (reason: string, exitCode = 0) => {
    if (isShuttingDown) return
    isShuttingDown = true

    log.info({ reason }, 'Shutting down...')

    // 1. Stop reading input and release any render blocked on peers
    source.stop()
    sink.unlock()

    // 2. Stop accepting new connections
    server.close((err) => {
      if (err) {
        log.warn({ err }, 'Error closing HTTP server')
      }
    })

    // 3. Close every peer connection
    try {
      await sink.deactivate()
    } catch (err) {
      log.warn({ err }, 'Error stopping sink')
    }

    log.info('Shutdown complete')
    process.exit(exitCode)
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })

  source
    .run()
    .then((stats) => {
      log.info(stats, 'Input finished')
      return shutdown(`input ${stats.endedBy}`)
    })
    .catch((err) => {
      log.error({ err }, 'Input failed')
      return shutdown('input error', 1)
    })
}

main().catch((err) => {
  log.error({ err }, 'Fatal startup error')
  process.exit(1)
})
