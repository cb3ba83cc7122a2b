/**
 * Validation Utilities Library
 *
 * Schema-based validation for request bodies and for the payloads the
 * collection API sends back. Payload schemas fail closed: a response whose
 * shape does not match is rejected as a whole instead of being read
 * opportunistically.
 *
 * Features:
 * - Declarative field schemas with nested objects, arrays and maps
 * - Built-in rules for common patterns
 * - Field-level issue reporting
 * - Sanitization of user input
 * - Narrowing readers for values that passed a schema
 */

import type { H3Event } from 'h3'
import { readBody } from 'h3'
import { ValidationError } from '~/lib/error-utils'

export interface ValidationRule {
  name: string
  message: string
  validate: (value: unknown, context: ValidationContext) => boolean
  sanitize?: (value: unknown) => unknown
}

export interface FieldSchema {
  rules: ValidationRule[]
  optional?: boolean
  nullable?: boolean
  transform?: (value: unknown) => unknown
  nested?: ValidationSchema    // Value is an object with this schema
  items?: ValidationSchema     // Value is an array of objects with this schema
  entries?: ValidationSchema   // Value is a map whose values have this schema
}

export interface ValidationSchema {
  [key: string]: FieldSchema
}

export interface ValidationContext {
  field: string
  value: unknown
  object: Record<string, unknown>
}

export interface FieldIssue {
  field: string
  message: string
  code: string
}

export interface ValidationOptions {
  stopOnFirstError?: boolean
  sanitize?: boolean
  strict?: boolean              // Reject keys the schema does not name
}

export interface ValidationResult {
  valid: boolean
  errors: FieldIssue[]
  sanitized?: Record<string, unknown>
}

/**
 * Narrowing readers
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function readString(source: Record<string, unknown>, key: string): string | null {
  const value = source[key]
  return typeof value === 'string' ? value : null
}

export function readNumber(source: Record<string, unknown>, key: string): number | null {
  const value = source[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

export function readRecords(source: Record<string, unknown>, key: string): Record<string, unknown>[] {
  const value = source[key]
  return Array.isArray(value) ? value.filter(isRecord) : []
}

/**
 * Core validator class
 */
export class Validator {
  /**
   * Validate data against schema
   */
  validate(data: unknown, schema: ValidationSchema, options: ValidationOptions = {}): ValidationResult {
    const errors: FieldIssue[] = []

    if (!isRecord(data)) {
      return {
        valid: false,
        errors: [{ field: '', message: 'Expected an object', code: 'NOT_AN_OBJECT' }]
      }
    }

    const sanitized: Record<string, unknown> = {}

    if (options.strict) {
      for (const key of Object.keys(data)) {
        if (!(key in schema)) {
          errors.push({ field: key, message: `Unknown field '${key}'`, code: 'UNKNOWN_FIELD' })
        }
      }
    }

    for (const [field, fieldSchema] of Object.entries(schema)) {
      if (options.stopOnFirstError && errors.length > 0) break

      const value = data[field]

      if (value === undefined || (value === null && (fieldSchema.nullable || fieldSchema.optional))) {
        if (!fieldSchema.optional && value === undefined) {
          errors.push({ field, message: `Field '${field}' is required`, code: 'REQUIRED_FIELD_MISSING' })
        } else if (value === null) {
          sanitized[field] = null
        }
        continue
      }

      if (value === null) {
        errors.push({ field, message: `Field '${field}' must not be null`, code: 'NULL_VALUE' })
        continue
      }

      let transformedValue: unknown = value
      if (fieldSchema.transform) {
        try {
          transformedValue = fieldSchema.transform(value)
        } catch (error) {
          errors.push({
            field,
            message: `Field transformation failed: ${error instanceof Error ? error.message : String(error)}`,
            code: 'TRANSFORMATION_FAILED'
          })
          continue
        }
      }

      const context: ValidationContext = { field, value: transformedValue, object: data }
      let ruleFailed = false

      for (const rule of fieldSchema.rules) {
        if (!rule.validate(transformedValue, context)) {
          errors.push({ field, message: rule.message, code: rule.name.toUpperCase() })
          ruleFailed = true
          break
        }
        if (rule.sanitize && options.sanitize) {
          transformedValue = rule.sanitize(transformedValue)
        }
      }

      if (ruleFailed) continue

      if (fieldSchema.nested) {
        transformedValue = this.validateChild(transformedValue, fieldSchema.nested, field, errors, options)
      } else if (fieldSchema.items) {
        const itemSchema = fieldSchema.items
        transformedValue = Array.isArray(transformedValue)
          ? transformedValue.map((item, index) => this.validateChild(item, itemSchema, `${field}[${index}]`, errors, options))
          : transformedValue
      } else if (fieldSchema.entries && isRecord(transformedValue)) {
        const entrySchema = fieldSchema.entries
        const mapped: Record<string, unknown> = {}
        for (const [key, entry] of Object.entries(transformedValue)) {
          mapped[key] = this.validateChild(entry, entrySchema, `${field}.${key}`, errors, options)
        }
        transformedValue = mapped
      }

      sanitized[field] = transformedValue
    }

    return {
      valid: errors.length === 0,
      errors,
      ...(options.sanitize && { sanitized })
    }
  }

  /**
   * Validation that throws on error and returns the sanitized object
   */
  validateAndThrow(
    data: unknown,
    schema: ValidationSchema,
    options: ValidationOptions = {}
  ): Record<string, unknown> {
    const result = this.validate(data, schema, { ...options, sanitize: true })

    if (!result.valid || !result.sanitized) {
      const first = result.errors[0]
      throw new ValidationError(
        first ? `${first.field ? `${first.field}: ` : ''}${first.message}` : 'Validation failed',
        { field: first?.field, value: result.errors }
      )
    }

    return result.sanitized
  }

  private validateChild(
    value: unknown,
    schema: ValidationSchema,
    prefix: string,
    errors: FieldIssue[],
    options: ValidationOptions
  ): unknown {
    const nested = this.validate(value, schema, options)

    for (const error of nested.errors) {
      errors.push({
        ...error,
        field: error.field ? `${prefix}.${error.field}` : prefix
      })
    }

    return nested.sanitized ?? value
  }
}

/**
 * Built-in validation rules
 */
export const Rules = {
  string: (options: { minLength?: number; maxLength?: number; pattern?: RegExp } = {}): ValidationRule => ({
    name: 'string',
    message: options.minLength ? `Must be a string of at least ${options.minLength} characters` : 'Must be a string',
    validate: (value) => typeof value === 'string' &&
      (options.minLength === undefined || value.trim().length >= options.minLength) &&
      (options.maxLength === undefined || value.length <= options.maxLength) &&
      (options.pattern === undefined || options.pattern.test(value)),
    sanitize: (value) => typeof value === 'string' ? value.trim() : value
  }),

  number: (options: { min?: number; max?: number; integer?: boolean } = {}): ValidationRule => ({
    name: 'number',
    message: 'Must be a valid number',
    validate: (value) => typeof value === 'number' &&
      Number.isFinite(value) &&
      (options.min === undefined || value >= options.min) &&
      (options.max === undefined || value <= options.max) &&
      (!options.integer || Number.isInteger(value))
  }),

  boolean: (): ValidationRule => ({
    name: 'boolean',
    message: 'Must be true or false',
    validate: (value) => typeof value === 'boolean'
  }),

  array: (options: { minLength?: number; maxLength?: number; itemValidator?: ValidationRule } = {}): ValidationRule => ({
    name: 'array',
    message: 'Must be an array',
    validate: (value, context) => {
      if (!Array.isArray(value)) return false
      if (options.minLength !== undefined && value.length < options.minLength) return false
      if (options.maxLength !== undefined && value.length > options.maxLength) return false

      const itemValidator = options.itemValidator
      return !itemValidator || value.every(item => itemValidator.validate(item, context))
    }
  }),

  object: (): ValidationRule => ({
    name: 'object',
    message: 'Must be an object',
    validate: (value) => isRecord(value)
  }),

  url: (options: { protocols?: string[] } = {}): ValidationRule => ({
    name: 'url',
    message: 'Must be a valid URL',
    validate: (value) => {
      if (typeof value !== 'string') return false
      try {
        const url = new URL(value)
        return !options.protocols || options.protocols.includes(url.protocol.replace(':', ''))
      } catch {
        return false
      }
    }
  }),

  enum: <T extends string | number | boolean>(values: readonly T[]): ValidationRule => ({
    name: 'enum',
    message: `Must be one of: ${values.join(', ')}`,
    validate: (value) => values.some(candidate => candidate === value)
  }),

  /**
   * Integer or digit-only string, the two shapes an id takes on the wire
   */
  identifier: (): ValidationRule => ({
    name: 'identifier',
    message: 'Must be a positive integer id',
    validate: (value) => (typeof value === 'number' && Number.isInteger(value) && value >= 0) ||
      (typeof value === 'string' && /^\d+$/.test(value))
  }),

  custom: (name: string, validate: (value: unknown) => boolean, message: string): ValidationRule => ({
    name,
    message,
    validate
  })
}

/**
 * Sanitization utilities
 */
export const Sanitizers = {
  /**
   * Sanitize free-text user input
   */
  userInput: (value: string): string => {
    return value
      .replace(/[\u0000-\u001F\u007F]/g, '')
      .trim()
      .substring(0, 1000)
  },

  /**
   * Sanitize filename
   */
  filename: (value: string): string => {
    return value
      .replace(/[<>:"/\\|?*]/g, '')
      .replace(/\s+/g, '_')
      .substring(0, 255)
  }
}

const sortCriteria = ['artist_asc', 'artist_desc', 'year_desc', 'year_asc', 'date_added_desc'] as const

const overrideText = (): FieldSchema => ({
  rules: [Rules.string({ maxLength: 1000 })],
  optional: true,
  transform: (value) => typeof value === 'string' ? Sanitizers.userInput(value) : value
})

/**
 * Request body schemas
 */
export const RequestSchemas = {
  auth: {
    consumerKey: { rules: [Rules.string({ minLength: 1, maxLength: 200 })], optional: true },
    consumerSecret: { rules: [Rules.string({ minLength: 1, maxLength: 200 })], optional: true },
    token: { rules: [Rules.string({ minLength: 1, maxLength: 200 })], optional: true },
    tokenSecret: { rules: [Rules.string({ minLength: 1, maxLength: 200 })], optional: true }
  } satisfies ValidationSchema,

  sort: {
    sort: { rules: [Rules.enum(sortCriteria)] }
  } satisfies ValidationSchema,

  selection: {
    releaseIds: {
      rules: [Rules.array({ maxLength: 10000, itemValidator: Rules.identifier() })],
      optional: true
    },
    letters: {
      rules: [
        Rules.object(),
        Rules.custom(
          'letters',
          (value) => isRecord(value) && Object.entries(value).every(([letter, on]) =>
            /^(#|\p{L})$/u.test(letter) && typeof on === 'boolean'),
          'Letters must map a single letter or # to true/false'
        )
      ],
      optional: true
    }
  } satisfies ValidationSchema,

  edits: {
    edits: {
      rules: [
        Rules.object(),
        Rules.custom('edit_keys', (value) => isRecord(value) && Object.keys(value).every(key => /^\d+$/.test(key)),
          'Edits must be keyed by release id')
      ],
      optional: true,
      entries: {
        artist: overrideText(),
        title: overrideText(),
        url: { rules: [Rules.url({ protocols: ['http', 'https'] })], optional: true }
      }
    }
  } satisfies ValidationSchema
}

/**
 * Collection API payload schemas
 */
export const DiscogsSchemas = {
  identity: {
    id: { rules: [Rules.number({ integer: true })] },
    username: { rules: [Rules.string({ minLength: 1 })] }
  } satisfies ValidationSchema,

  folderList: {
    folders: {
      rules: [Rules.array()],
      items: {
        id: { rules: [Rules.number({ integer: true, min: 0 })] },
        name: { rules: [Rules.string()] },
        count: { rules: [Rules.number({ integer: true, min: 0 })], optional: true }
      }
    }
  } satisfies ValidationSchema,

  pagination: {
    page: { rules: [Rules.number({ integer: true, min: 1 })] },
    pages: { rules: [Rules.number({ integer: true, min: 0 })] }
  } satisfies ValidationSchema,

  artistCredit: {
    name: { rules: [Rules.string()] },
    anv: { rules: [Rules.string()], optional: true },
    join: { rules: [Rules.string()], optional: true }
  } satisfies ValidationSchema,

  namedEntity: {
    name: { rules: [Rules.string()] }
  } satisfies ValidationSchema
}

const basicInformation: ValidationSchema = {
  id: { rules: [Rules.number({ integer: true, min: 0 })] },
  title: { rules: [Rules.string()], nullable: true, optional: true },
  year: { rules: [Rules.number({ integer: true })], nullable: true, optional: true },
  artists: { rules: [Rules.array()], items: DiscogsSchemas.artistCredit, optional: true },
  labels: { rules: [Rules.array()], items: DiscogsSchemas.namedEntity, optional: true },
  formats: { rules: [Rules.array()], items: DiscogsSchemas.namedEntity, optional: true }
}

export const DiscogsPayloadSchemas = {
  folderReleasesPage: {
    pagination: { rules: [Rules.object()], nested: DiscogsSchemas.pagination },
    releases: {
      rules: [Rules.array()],
      items: {
        id: { rules: [Rules.number({ integer: true, min: 0 })] },
        date_added: { rules: [Rules.string()], optional: true, nullable: true },
        basic_information: { rules: [Rules.object()], nested: basicInformation }
      }
    }
  } satisfies ValidationSchema
}

/**
 * Build a reader that parses and validates the JSON body of a request
 */
export function createBodyValidator(schema: ValidationSchema, options: { strict?: boolean } = {}) {
  const validator = new Validator()

  return async (event: H3Event): Promise<Record<string, unknown>> => {
    const body: unknown = await readBody(event)
    const payload = body === undefined || body === null || body === '' ? {} : body
    return validator.validateAndThrow(payload, schema, { strict: options.strict ?? true })
  }
}

let globalValidator: Validator | null = null

export function useValidator(): Validator {
  if (!globalValidator) {
    globalValidator = new Validator()
  }

  return globalValidator
}
