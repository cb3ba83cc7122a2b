/**
 * Error Handling Utilities Library
 *
 * Structured error classification, logging and HTTP mapping for the
 * collection export. Nothing here retries: every failure is handed back to
 * the caller, which decides whether to surface it, drop a release, or abort.
 *
 * Features:
 * - Typed error hierarchy with user-facing messages and suggestions
 * - Normalisation of unknown errors
 * - Error counters for the health endpoint
 * - HTTP status mapping for API responses
 */

import { useLogger } from '~/lib/logger'

export interface ErrorContext {
  operation: string
  sessionId?: string
  requestId?: string
  timestamp: number
  userAgent?: string
  ip?: string
  endpoint?: string
  method?: string
  metadata?: Record<string, unknown>
}

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical'

export type ErrorCategory =
  | 'validation'
  | 'network'
  | 'auth'
  | 'rate_limit'
  | 'api'
  | 'template'
  | 'sequence'
  | 'system'

export interface ErrorDetails {
  code: string
  message: string
  severity: ErrorSeverity
  category: ErrorCategory
  retryable: boolean
  userMessage: string
  suggestedActions: string[]
  context?: ErrorContext
  cause?: unknown
  metadata: Record<string, unknown>
}

export interface ErrorMetrics {
  totalErrors: number
  errorsByType: Record<string, number>
  errorsBySeverity: Record<string, number>
  errorsByEndpoint: Record<string, number>
}

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly details: ErrorDetails

  constructor(details: Partial<ErrorDetails> & { message: string }) {
    super(details.message)
    this.name = 'AppError'

    this.details = {
      code: details.code || 'UNKNOWN_ERROR',
      message: details.message,
      severity: details.severity || 'medium',
      category: details.category || 'system',
      retryable: details.retryable ?? false,
      userMessage: details.userMessage || 'An unexpected error occurred',
      suggestedActions: details.suggestedActions || [],
      context: details.context,
      cause: details.cause,
      metadata: details.metadata || {}
    }
  }

  get context(): ErrorContext | undefined {
    return this.details.context
  }

  /**
   * Create user-friendly error response
   */
  toUserResponse(): {
    error: {
      code: string
      message: string
      suggestions: string[]
      retryable: boolean
      details?: Record<string, unknown>
    }
    requestId?: string
  } {
    const details = this.publicDetails()
    return {
      error: {
        code: this.details.code,
        message: this.details.userMessage,
        suggestions: this.details.suggestedActions,
        retryable: this.details.retryable,
        ...(details && { details })
      },
      requestId: this.details.context?.requestId
    }
  }

  /**
   * Metadata that is safe to show to the user. Subclasses opt in.
   */
  protected publicDetails(): Record<string, unknown> | undefined {
    return undefined
  }
}

/**
 * Specific error types
 */
export class ValidationError extends AppError {
  public readonly field?: string
  public readonly releaseId?: number | string
  public readonly missingFields: string[]

  constructor(
    message: string,
    options: {
      field?: string
      value?: unknown
      releaseId?: number | string
      missingFields?: string[]
    } = {}
  ) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      category: 'validation',
      severity: 'low',
      userMessage: `Invalid input: ${message}`,
      suggestedActions: options.missingFields?.length
        ? ['Edit the release to fill in the missing fields, or leave it out of the export']
        : ['Check your input and try again'],
      retryable: false,
      metadata: {
        field: options.field,
        value: options.value,
        releaseId: options.releaseId,
        missingFields: options.missingFields
      }
    })
    this.name = 'ValidationError'
    this.field = options.field
    this.releaseId = options.releaseId
    this.missingFields = options.missingFields || []
  }

  protected publicDetails(): Record<string, unknown> | undefined {
    if (this.field === undefined && this.releaseId === undefined) return undefined
    return {
      ...(this.field !== undefined && { field: this.field }),
      ...(this.releaseId !== undefined && { releaseId: this.releaseId, missingFields: this.missingFields })
    }
  }
}

export class NetworkError extends AppError {
  constructor(message: string, endpoint?: string, cause?: unknown) {
    super({
      message,
      code: 'NETWORK_ERROR',
      category: 'network',
      severity: 'medium',
      userMessage: 'Could not reach Discogs. Please check your connection.',
      suggestedActions: ['Check your internet connection', 'Try again in a moment'],
      retryable: true,
      cause,
      metadata: { endpoint }
    })
    this.name = 'NetworkError'
  }
}

export class AuthError extends AppError {
  constructor(message: string, reason?: string, cause?: unknown) {
    super({
      message,
      code: 'AUTH_ERROR',
      category: 'auth',
      severity: 'medium',
      userMessage: 'Authentication with Discogs failed.',
      suggestedActions: ['Check your consumer key and secret', 'Authorize the application again'],
      retryable: false,
      cause,
      metadata: { reason }
    })
    this.name = 'AuthError'
  }
}

export class RateLimitError extends AppError {
  constructor(message: string, retryAfter?: number) {
    super({
      message,
      code: 'RATE_LIMIT_ERROR',
      category: 'rate_limit',
      severity: 'medium',
      userMessage: 'Too many requests to Discogs. Please wait a moment before trying again.',
      suggestedActions: [
        retryAfter ? `Wait ${retryAfter} seconds before trying again` : 'Wait a moment before trying again'
      ],
      retryable: true,
      metadata: { retryAfter }
    })
    this.name = 'RateLimitError'
  }
}

export class ApiError extends AppError {
  public readonly statusCode?: number

  constructor(message: string, statusCode?: number, endpoint?: string, cause?: unknown) {
    super({
      message,
      code: statusCode === 404 ? 'NOT_FOUND' : 'API_ERROR',
      category: 'api',
      severity: statusCode && statusCode >= 500 ? 'high' : 'medium',
      userMessage: statusCode === 404
        ? 'The requested folder or release does not exist.'
        : 'Discogs could not complete the request. Please try again.',
      suggestedActions: ['Try again in a few minutes', 'Check the Discogs service status'],
      retryable: statusCode !== 400 && statusCode !== 404,
      cause,
      metadata: { statusCode, endpoint }
    })
    this.name = 'ApiError'
    this.statusCode = statusCode
  }
}

export class TemplateError extends AppError {
  constructor(message: string, problems: string[] = []) {
    super({
      message,
      code: 'TEMPLATE_ERROR',
      category: 'template',
      severity: 'critical',
      userMessage: 'The QR-label template is misconfigured; the export was aborted.',
      suggestedActions: ['Contact the operator of this service'],
      retryable: false,
      metadata: { problems }
    })
    this.name = 'TemplateError'
  }

  get problems(): string[] {
    const problems = this.details.metadata.problems
    return Array.isArray(problems) ? problems.map(String) : []
  }
}

export class SequenceError extends AppError {
  public readonly requiredStage: string
  public readonly currentStage: string

  constructor(operation: string, requiredStage: string, currentStage: string) {
    super({
      message: `Cannot ${operation} before reaching stage ${requiredStage} (current stage: ${currentStage})`,
      code: 'SEQUENCE_ERROR',
      category: 'sequence',
      severity: 'low',
      userMessage: `This step requires the ${requiredStage} stage first.`,
      suggestedActions: [`Complete the ${requiredStage} step and try again`],
      retryable: false,
      metadata: { operation, requiredStage, currentStage }
    })
    this.name = 'SequenceError'
    this.requiredStage = requiredStage
    this.currentStage = currentStage
  }

  protected publicDetails(): Record<string, unknown> {
    return { requiredStage: this.requiredStage, currentStage: this.currentStage }
  }
}

/**
 * Error handler: normalises, logs and counts errors
 */
export class ErrorHandler {
  private logger = useLogger('errors')
  private metrics: ErrorMetrics = ErrorHandler.emptyMetrics()

  /**
   * Normalise and record an error. Returns the AppError the caller should surface.
   */
  handleError(error: unknown, context: ErrorContext): AppError {
    const appError = this.normalizeError(error, context)
    this.updateMetrics(appError, context)
    this.logError(appError, context)
    return appError
  }

  /**
   * Normalize any error to AppError
   */
  normalizeError(error: unknown, context: ErrorContext): AppError {
    if (error instanceof AppError) {
      if (!error.details.context) {
        error.details.context = context
      }
      return error
    }

    const cause = error instanceof Error ? error : new Error(String(error))

    if (/fetch failed|network|ECONNREFUSED|ENOTFOUND/i.test(cause.message)) {
      const networkError = new NetworkError(cause.message, context.endpoint, cause)
      networkError.details.context = context
      return networkError
    }

    return new AppError({
      message: cause.message,
      code: 'UNKNOWN_ERROR',
      category: 'system',
      severity: 'high',
      userMessage: 'An unexpected error occurred',
      suggestedActions: ['Try again, or clear the session and start over'],
      retryable: false,
      context,
      cause
    })
  }

  private logError(error: AppError, context: ErrorContext): void {
    const line = `[${error.details.severity.toUpperCase()}] ${error.details.code}: ${error.message}`
    const meta = { operation: context.operation, requestId: context.requestId, endpoint: context.endpoint }

    switch (error.details.severity) {
      case 'critical':
      case 'high':
        this.logger.error(line, meta, error.details.cause ?? '')
        break
      case 'medium':
        this.logger.warn(line, meta)
        break
      default:
        this.logger.info(line, meta)
    }
  }

  private updateMetrics(error: AppError, context: ErrorContext): void {
    this.metrics.totalErrors++

    const errorType = error.details.code
    this.metrics.errorsByType[errorType] = (this.metrics.errorsByType[errorType] || 0) + 1

    const severity = error.details.severity
    this.metrics.errorsBySeverity[severity] = (this.metrics.errorsBySeverity[severity] || 0) + 1

    if (context.endpoint) {
      this.metrics.errorsByEndpoint[context.endpoint] = (this.metrics.errorsByEndpoint[context.endpoint] || 0) + 1
    }
  }

  getMetrics(): ErrorMetrics {
    return {
      totalErrors: this.metrics.totalErrors,
      errorsByType: { ...this.metrics.errorsByType },
      errorsBySeverity: { ...this.metrics.errorsBySeverity },
      errorsByEndpoint: { ...this.metrics.errorsByEndpoint }
    }
  }

  private static emptyMetrics(): ErrorMetrics {
    return {
      totalErrors: 0,
      errorsByType: {},
      errorsBySeverity: {},
      errorsByEndpoint: {}
    }
  }
}

/**
 * Error utilities for API responses
 */
export const ErrorResponse = {
  /**
   * Create standardized error response
   */
  create(error: AppError, statusCode?: number): object {
    return {
      success: false,
      ...error.toUserResponse(),
      timestamp: new Date().toISOString(),
      statusCode: statusCode ?? ErrorResponse.getStatusCode(error)
    }
  },

  /**
   * Get appropriate HTTP status code for error
   */
  getStatusCode(error: AppError): number {
    switch (error.details.category) {
      case 'validation':
        return 400
      case 'auth':
        return 401
      case 'sequence':
        return 409
      case 'rate_limit':
        return 429
      case 'api':
        return error instanceof ApiError && error.statusCode === 404 ? 404 : 502
      case 'network':
        return 503
      default:
        return 500
    }
  }
}

export function createErrorContext(
  operation: string,
  additionalContext?: Partial<ErrorContext>
): ErrorContext {
  return {
    operation,
    timestamp: Date.now(),
    requestId: Math.random().toString(36).substring(2, 15),
    ...additionalContext
  }
}

let globalErrorHandler: ErrorHandler | null = null

export function useErrorHandler(): ErrorHandler {
  if (!globalErrorHandler) {
    globalErrorHandler = new ErrorHandler()
  }

  return globalErrorHandler
}
