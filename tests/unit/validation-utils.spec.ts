import { describe, expect, it } from 'vitest'
import { ValidationError } from '~/lib/error-utils'
import {
  DiscogsSchemas,
  RequestSchemas,
  Sanitizers,
  Validator
} from '~/lib/validation-utils'

const validator = new Validator()

describe('Validator', () => {
  it('prefixes issues found inside array items', () => {
    const result = validator.validate(
      { folders: [{ id: 1, name: 'All' }, { id: 'x', name: 'Jazz' }] },
      DiscogsSchemas.folderList
    )

    expect(result.valid).toBe(false)
    expect(result.errors).toEqual([{ field: 'folders[1].id', message: 'Must be a valid number', code: 'NUMBER' }])
  })

  it('rejects anything that is not an object', () => {
    expect(validator.validate([], DiscogsSchemas.identity).errors[0]?.code).toBe('NOT_AN_OBJECT')
  })

  it('rejects unknown fields in strict mode', () => {
    const result = validator.validate({ sort: 'artist_asc', extra: 1 }, RequestSchemas.sort, { strict: true })

    expect(result.errors).toEqual([{ field: 'extra', message: 'Unknown field \'extra\'', code: 'UNKNOWN_FIELD' }])
  })

  it('only accepts known sort criteria', () => {
    const result = validator.validate({ sort: 'random' }, RequestSchemas.sort)

    expect(result.errors[0]?.code).toBe('ENUM')
  })

  it('sanitizes edit overrides', () => {
    const sanitized = validator.validateAndThrow(
      { edits: { '5': { artist: '  New\u0007 ' } } },
      RequestSchemas.edits
    )

    expect(sanitized).toEqual({ edits: { '5': { artist: 'New' } } })
  })

  it('throws a ValidationError naming the field', () => {
    expect(() => validator.validateAndThrow({ edits: { abc: {} } }, RequestSchemas.edits))
      .toThrow('edits: Edits must be keyed by release id')

    try {
      validator.validateAndThrow({ edits: { '5': { url: 'ftp://example.com' } } }, RequestSchemas.edits)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.field).toBe('edits.5.url')
      }
    }
  })

  it('accepts numeric and digit-string release ids', () => {
    expect(validator.validate({ releaseIds: [1, '2'] }, RequestSchemas.selection).valid).toBe(true)
    expect(validator.validate({ releaseIds: [1, 'two'] }, RequestSchemas.selection).valid).toBe(false)
  })

  it('accepts letter toggles only for single letters or #', () => {
    expect(validator.validate({ letters: { A: true, '#': false } }, RequestSchemas.selection).valid).toBe(true)
    expect(validator.validate({ letters: { AB: true } }, RequestSchemas.selection).valid).toBe(false)
  })
})

describe('Sanitizers', () => {
  it('strips path characters from file names', () => {
    expect(Sanitizers.filename('a/b:c d.csv')).toBe('abc_d.csv')
  })
})
