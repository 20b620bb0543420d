import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { randomUUID } from 'crypto'
import { logger, withLogContext } from './logger.js'
import { DEFAULT_HTTP_SLOW_MS } from './config.js'

export type RequestLoggerOptions = {
  slowMs?: number
}

function getRequestId(req: Request): string {
  const headerId = req.headers['x-request-id']
  if (typeof headerId === 'string' && headerId.trim()) return headerId
  return randomUUID()
}

export function createRequestLogger(options: RequestLoggerOptions = {}): RequestHandler {
  const slowMs = options.slowMs ?? DEFAULT_HTTP_SLOW_MS

  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = getRequestId(req)
    res.setHeader('x-request-id', requestId)

    const start = process.hrtime.bigint()

    withLogContext(
      {
        requestId,
        requestMethod: req.method,
        requestPath: req.originalUrl,
        ip: req.ip,
        userAgent: req.headers['user-agent'],
      },
      () => {
        res.on('finish', () => {
          const durationMs = Number(process.hrtime.bigint() - start) / 1e6
          const statusCode = res.statusCode
          const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info'

          logger[level](
            {
              event: 'http_request',
              component: 'http',
              statusCode,
              durationMs: Number(durationMs.toFixed(2)),
              contentLength: res.getHeader('content-length'),
            },
            'HTTP request',
          )

          if (durationMs >= slowMs) {
            logger.warn(
              {
                event: 'http_request_slow',
                component: 'http',
                method: req.method,
                path: req.originalUrl,
                statusCode,
                durationMs: Number(durationMs.toFixed(2)),
                requestBytes: req.headers['content-length'],
                responseBytes: res.getHeader('content-length'),
              },
              'Slow HTTP request',
            )
          }
        })

        next()
      },
    )
  }
}
