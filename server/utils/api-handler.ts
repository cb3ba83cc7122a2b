/**
 * Route handler plumbing
 *
 * Every API route is built from the server's services and runs inside the
 * caller's export session. Failures are normalised by the ErrorHandler and
 * leave as an h3 error carrying the standard error envelope.
 */

import type { EventHandler, H3Event } from 'h3'
import { createError, defineEventHandler, getRequestURL, isError } from 'h3'
import type { CollectionClient } from '~/lib/discogs-client'
import {
  AppError,
  ErrorHandler,
  ErrorResponse,
  ValidationError,
  createErrorContext
} from '~/lib/error-utils'
import type { ExportSession } from '~/lib/export-session'
import type { CsvTemplate } from '~/types'
import type { RuntimeConfig } from './runtime-config'
import type { SessionStore } from './session'

export interface ServerServices {
  client: CollectionClient
  template: CsvTemplate
  sessions: SessionStore
  config: RuntimeConfig
  errorHandler: ErrorHandler
  startedAt: number
}

export interface RouteContext {
  session: ExportSession
  services: ServerServices
  requestId: string
}

export type ApiRoute = (services: ServerServices) => EventHandler

export interface ApiSuccess<T> {
  success: true
  data: T
}

export function ok<T>(data: T): ApiSuccess<T> {
  return { success: true, data }
}

export function requestIdOf(event: H3Event): string {
  const requestId: unknown = event.context.requestId
  return typeof requestId === 'string' ? requestId : 'unknown'
}

/**
 * Map framework errors raised while reading a request onto AppErrors
 */
export function toAppError(error: unknown): unknown {
  if (error instanceof AppError || !isError(error)) return error
  if (error.cause instanceof AppError) return error.cause

  if (error.statusCode === 404) {
    return new AppError({
      message: error.message,
      code: 'NOT_FOUND',
      category: 'validation',
      severity: 'low',
      userMessage: 'No such endpoint.',
      suggestedActions: ['Check the request path']
    })
  }

  if (error.statusCode >= 400 && error.statusCode < 500) {
    return new ValidationError(error.statusMessage || error.message)
  }

  return error
}

/**
 * Log and classify a failure, returning the h3 error to throw
 */
export function toHttpError(error: unknown, event: H3Event, operation: string, errorHandler: ErrorHandler) {
  const context = createErrorContext(operation, {
    requestId: requestIdOf(event),
    endpoint: getRequestURL(event).pathname,
    method: event.method
  })

  const appError = errorHandler.handleError(toAppError(error), context)
  const statusCode = appError.details.code === 'NOT_FOUND' ? 404 : ErrorResponse.getStatusCode(appError)

  return createError({
    statusCode,
    statusMessage: appError.details.code,
    data: ErrorResponse.create(appError, statusCode)
  })
}

export function defineApiRoute<T>(
  operation: string,
  handler: (event: H3Event, context: RouteContext) => T | Promise<T>
): ApiRoute {
  return (services) => defineEventHandler(async (event) => {
    const resolved = services.sessions.resolve(event)
    try {
      return await handler(event, { session: resolved.session, services, requestId: requestIdOf(event) })
    } catch (error) {
      throw toHttpError(error, event, operation, services.errorHandler)
    } finally {
      services.sessions.commit(event, resolved)
    }
  })
}
