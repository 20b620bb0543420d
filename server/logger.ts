import { AsyncLocalStorage } from 'async_hooks'
import fs from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import pino, { type DestinationStream, type LevelWithSilent } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const env = process.env.NODE_ENV || 'development'
const DEFAULT_LEVEL: LevelWithSilent = 'debug'
const LOG_FILE_SIZE = '10M'
const LOG_FILE_MAX_FILES = 5

/** Fields stamped on every entry logged while a context is active. */
export type LogContext = {
  requestId?: string
  requestPath?: string
  requestMethod?: string
  ip?: string
  userAgent?: string
  sessionId?: string
}

const logContext = new AsyncLocalStorage<LogContext>()

function readPackageVersion(): string | undefined {
  let dir = path.dirname(fileURLToPath(import.meta.url))
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, 'package.json')
    if (fs.existsSync(candidate)) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'))
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version
        }
      } catch (err) {
        process.emitWarning(`Could not read package version: ${String(err)}`)
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

export const appVersion = process.env.npm_package_version || process.env.APP_VERSION || readPackageVersion()

/**
 * Run `fn` with `context` merged over the enclosing one, so a peer admitted
 * during an HTTP request logs both the request id and its session id.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run({ ...logContext.getStore(), ...context }, fn)
}

export function createLogger(destination: DestinationStream) {
  return pino(
    {
      level: DEFAULT_LEVEL,
      base: { app: 'livesink', env, version: appVersion },
      formatters: {
        level(label: string, number: number) {
          return { level: number, severity: label }
        },
      },
      mixin() {
        // pino mutates the returned object, so each call gets a copy.
        const ctx = logContext.getStore()
        return ctx ? { ...ctx } : {}
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  )
}

function createConsoleStream(): DestinationStream {
  if (env === 'production' || env === 'test') return pino.destination(1)
  return pino.transport({
    target: 'pino-pretty',
    options: { colorize: true, translateTime: 'SYS:standard' },
  })
}

const consoleStream = createConsoleStream()
const outputs = pino.multistream([{ stream: consoleStream, level: 'trace' }])

export const logger = createLogger(outputs)

export type LoggingOptions = {
  level: LevelWithSilent
  /** Mirror every entry into this file, rotated by size. */
  logFilePath?: string | null
}

export function createLogFileStream(filePath: string): RotatingFileStream {
  const dir = path.dirname(filePath)
  fs.mkdirSync(dir, { recursive: true })
  return createStream(path.basename(filePath), { path: dir, size: LOG_FILE_SIZE, maxFiles: LOG_FILE_MAX_FILES })
}

/** Apply the validated logging settings to the root logger. Called once at startup. */
export function configureLogging(options: LoggingOptions): void {
  logger.level = options.level
  const filePath = options.logFilePath
  if (!filePath) return

  let stream: RotatingFileStream
  try {
    stream = createLogFileStream(filePath)
  } catch (err) {
    logger.warn({ err, filePath }, 'Log file disabled')
    return
  }
  // Stream trouble goes to the console only.
  const consoleLogger = createLogger(consoleStream)
  let warned = false
  const warnOnce = (err: Error, event: string) => {
    if (warned) return
    warned = true
    consoleLogger.warn({ err, filePath, event }, 'Log file stream issue')
  }
  stream.on('error', (err: Error) => warnOnce(err, 'error'))
  stream.on('warning', (err: Error) => warnOnce(err, 'warning'))
  outputs.add({ stream, level: 'trace' })
  logger.info({ filePath }, 'Mirroring log to file')
}
