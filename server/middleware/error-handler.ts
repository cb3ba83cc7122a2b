/**
 * Global Error Handler
 *
 * Last stop for errors thrown anywhere in the app. Route errors already
 * carry the standard envelope and are only sent; errors from middleware or
 * unmatched routes are classified here first.
 */

import type { H3Error, H3Event } from 'h3'
import { getRequestURL, send, setResponseStatus } from 'h3'
import type { ErrorHandler } from '~/lib/error-utils'
import { isRecord } from '~/lib/validation-utils'
import { useLogger } from '~/lib/logger'
import { toHttpError } from '../utils/api-handler'

const logger = useLogger('api')

function hasErrorEnvelope(data: unknown): boolean {
  return isRecord(data) && data.success === false && isRecord(data.error)
}

export function createErrorResponder(errorHandler: ErrorHandler) {
  return async (error: H3Error, event: H3Event): Promise<void> => {
    const httpError = hasErrorEnvelope(error.data)
      ? error
      : toHttpError(error, event, 'global-error-handler', errorHandler)

    const startTime: unknown = event.context.startTime
    if (typeof startTime === 'number') {
      const elapsed = Date.now() - startTime
      logger.debug(`${event.method} ${getRequestURL(event).pathname} - ${httpError.statusCode} - ${elapsed}ms`)
    }

    setResponseStatus(event, httpError.statusCode, httpError.statusMessage)
    await send(event, JSON.stringify(httpError.data), 'application/json')
  }
}
