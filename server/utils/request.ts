/**
 * Readers for request values that already passed their schema
 */

import { isSortCriterion } from '~/lib/collection-processor'
import { ValidationError } from '~/lib/error-utils'
import { isRecord, readString } from '~/lib/validation-utils'
import type { ReleaseEdits, ReleaseId, ReleaseOverrides, SortCriterion } from '~/types'

const EDITABLE_FIELDS = ['artist', 'title', 'url'] as const

export function readEdits(value: unknown): ReleaseEdits {
  const edits: ReleaseEdits = {}
  if (!isRecord(value)) return edits

  for (const [releaseId, overrides] of Object.entries(value)) {
    if (!isRecord(overrides)) continue

    const entry: ReleaseOverrides = {}
    for (const field of EDITABLE_FIELDS) {
      const text = readString(overrides, field)
      if (text !== null) entry[field] = text
    }
    edits[releaseId] = entry
  }

  return edits
}

export function readReleaseIds(value: unknown): ReleaseId[] | null {
  if (!Array.isArray(value)) return null
  return value.filter((id): id is ReleaseId => typeof id === 'number' || typeof id === 'string')
}

export function readLetters(value: unknown): [string, boolean][] {
  if (!isRecord(value)) return []

  const letters: [string, boolean][] = []
  for (const [letter, selected] of Object.entries(value)) {
    if (typeof selected === 'boolean') letters.push([letter, selected])
  }
  return letters
}

/**
 * Sort criterion from a query or body value; absent means the default
 */
export function readSortCriterion(value: unknown): SortCriterion | undefined {
  if (value === undefined || value === '') return undefined
  if (!isSortCriterion(value)) {
    throw new ValidationError(`Unknown sort criterion: ${String(value)}`, { field: 'sort', value })
  }
  return value
}

export function readFlag(value: unknown): boolean {
  return value === true || value === 'true' || value === '1'
}
