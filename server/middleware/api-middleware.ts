/**
 * Global API Middleware
 *
 * Provides common functionality across all API endpoints:
 * - Request ids and request logging
 * - Security headers
 * - CORS for the configured app origin
 * - Request size and content-type checks
 */

import { randomUUID } from 'node:crypto'
import {
  defineEventHandler,
  getHeader,
  getRequestURL,
  setHeaders,
  setResponseStatus,
  type EventHandler
} from 'h3'
import { ValidationError } from '~/lib/error-utils'
import { useLogger } from '~/lib/logger'
import type { RuntimeConfig } from '../utils/runtime-config'

export const MAX_REQUEST_SIZE = 1024 * 1024 // 1MB

const logger = useLogger('api')

export function createApiMiddleware(config: RuntimeConfig): EventHandler {
  const allowedOrigins = new Set([
    config.publicAppUrl,
    `http://localhost:${config.port}`,
    `http://127.0.0.1:${config.port}`
  ])

  return defineEventHandler((event) => {
    // Only apply to API routes
    if (!event.path.startsWith('/api/')) {
      return
    }

    const requestId = randomUUID().slice(0, 8)
    event.context.requestId = requestId
    event.context.startTime = Date.now()

    setHeaders(event, {
      'X-Request-ID': requestId,
      'X-API-Version': '1.0',
      'X-Content-Type-Options': 'nosniff',
      'X-Frame-Options': 'DENY',
      'Referrer-Policy': 'strict-origin-when-cross-origin',
      'Cache-Control': 'no-store'
    })

    const origin = getHeader(event, 'origin')
    if (origin && allowedOrigins.has(origin)) {
      setHeaders(event, {
        'Access-Control-Allow-Origin': origin,
        'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
        'Access-Control-Max-Age': '86400',
        'Access-Control-Allow-Credentials': 'true'
      })
    }

    // Preflight
    if (event.method === 'OPTIONS') {
      setResponseStatus(event, 204)
      return ''
    }

    const contentLength = Number.parseInt(getHeader(event, 'content-length') ?? '0', 10)
    if (contentLength > MAX_REQUEST_SIZE) {
      throw new ValidationError(`Request body exceeds ${MAX_REQUEST_SIZE} bytes`, { field: 'body' })
    }

    // Only bodies that are present have to be JSON; chunked bodies carry no length
    const hasBody = contentLength > 0 || getHeader(event, 'transfer-encoding') !== undefined
    if (event.method === 'POST' && hasBody) {
      const contentType = getHeader(event, 'content-type')
      if (!contentType?.includes('application/json')) {
        throw new ValidationError('Content-Type must be application/json', { field: 'content-type' })
      }
    }

    logger.debug(`${event.method} ${getRequestURL(event).pathname} [${requestId}]`)
  })
}
