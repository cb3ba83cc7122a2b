/**
 * Collection Processor
 *
 * Turns collection releases into QR-label CSV rows: validation of the
 * fields the label needs, sorting, grouping by starting letter for bulk
 * selection, user edits, and rendering against the label template.
 *
 * Every function here is synchronous and pure; inputs are never mutated.
 */

import { ValidationError } from '~/lib/error-utils'
import {
  CSV_RECORD_SEPARATOR,
  assertTemplate,
  formatCsvRow
} from '~/lib/csv-template'
import type {
  CsvTemplate,
  PreviewRow,
  RejectedRelease,
  Release,
  ReleaseEditableField,
  ReleaseEdits,
  SortCriterion,
  ValidRelease
} from '~/types'

export const UNKNOWN_YEAR = 0

export const OTHER_BUCKET = '#'

export const SORT_CRITERIA: readonly SortCriterion[] = [
  'artist_asc',
  'artist_desc',
  'year_desc',
  'year_asc',
  'date_added_desc'
]

const REQUIRED_FIELDS: readonly ReleaseEditableField[] = ['artist', 'title', 'url']

export type ReleaseValidation =
  | { valid: true; release: ValidRelease }
  | { valid: false; error: ValidationError }

export function isSortCriterion(value: unknown): value is SortCriterion {
  return SORT_CRITERIA.some(criterion => criterion === value)
}

export function isKnownYear(year: number): boolean {
  return Number.isInteger(year) && year > UNKNOWN_YEAR
}

/**
 * Check that a release carries everything the export needs. Every missing
 * field is reported, not just the first one.
 */
export function validate(release: Release): ReleaseValidation {
  const artist = release.artist?.trim() ?? ''
  const title = release.title?.trim() ?? ''
  const url = release.url?.trim() ?? ''

  const present: Record<ReleaseEditableField, boolean> = {
    artist: artist !== '',
    title: title !== '',
    url: url !== ''
  }
  const missingFields = REQUIRED_FIELDS.filter(field => !present[field])

  if (missingFields.length > 0) {
    return {
      valid: false,
      error: new ValidationError(
        `Release ${release.id} is missing ${missingFields.join(', ')}`,
        { releaseId: release.id, missingFields }
      )
    }
  }

  return {
    valid: true,
    release: {
      ...release,
      artist,
      title,
      url,
      year: isKnownYear(release.year) ? release.year : UNKNOWN_YEAR
    }
  }
}

/**
 * Split releases into exportable ones and rejects, keeping input order
 */
export function partition(releases: readonly Release[]): { valid: ValidRelease[]; rejected: RejectedRelease[] } {
  const valid: ValidRelease[] = []
  const rejected: RejectedRelease[] = []

  for (const release of releases) {
    const result = validate(release)
    if (result.valid) {
      valid.push(result.release)
    } else {
      rejected.push({
        id: release.id,
        missingFields: result.error.missingFields,
        message: result.error.message
      })
    }
  }

  return { valid, rejected }
}

function compareText(a: string | null, b: string | null): number {
  const left = (a ?? '').toLowerCase()
  const right = (b ?? '').toLowerCase()
  if (left < right) return -1
  if (left > right) return 1
  return 0
}

function compareYears(a: number, b: number, direction: 1 | -1): number {
  const aKnown = isKnownYear(a)
  const bKnown = isKnownYear(b)
  if (aKnown && bKnown) return (a - b) * direction
  if (aKnown) return -1
  if (bKnown) return 1
  return 0
}

function addedAt(release: Release): number {
  return release.dateAdded ? Date.parse(release.dateAdded) : Number.NaN
}

const comparators: Record<SortCriterion, (a: Release, b: Release) => number> = {
  artist_asc: (a, b) => compareText(a.artist, b.artist) || compareText(a.title, b.title),
  artist_desc: (a, b) => compareText(b.artist, a.artist) || compareText(a.title, b.title),
  year_asc: (a, b) => compareYears(a.year, b.year, 1),
  year_desc: (a, b) => compareYears(a.year, b.year, -1),
  date_added_desc: (a, b) => {
    const left = addedAt(a)
    const right = addedAt(b)
    if (Number.isNaN(left) && Number.isNaN(right)) return 0
    if (Number.isNaN(left)) return 1
    if (Number.isNaN(right)) return -1
    return right - left
  }
}

/**
 * Stable sort; returns a new array
 */
export function sort<T extends Release>(releases: readonly T[], criterion: SortCriterion): T[] {
  const compare = comparators[criterion]
  return [...releases].sort(compare)
}

/**
 * Bucket key for an artist name: its first letter upper-cased, or `#`
 */
export function bucketFor(artist: string | null): string {
  const first = Array.from((artist ?? '').trim())[0]
  if (!first || !/^\p{L}$/u.test(first)) return OTHER_BUCKET
  return Array.from(first.toUpperCase())[0] ?? OTHER_BUCKET
}

/**
 * Group releases by the starting letter of their artist. `#` comes first,
 * letters follow in ascending order; each bucket keeps input order.
 */
export function groupByStartingLetter<T extends Release>(releases: readonly T[]): Map<string, T[]> {
  const buckets = new Map<string, T[]>()

  for (const release of releases) {
    const key = bucketFor(release.artist)
    const bucket = buckets.get(key)
    if (bucket) {
      bucket.push(release)
    } else {
      buckets.set(key, [release])
    }
  }

  const keys = [...buckets.keys()].sort((a, b) => {
    if (a === OTHER_BUCKET) return -1
    if (b === OTHER_BUCKET) return 1
    return a < b ? -1 : a > b ? 1 : 0
  })

  return new Map(keys.map(key => [key, buckets.get(key) ?? []]))
}

/**
 * Apply user overrides to copies of the releases. Only artist, title and
 * url can be overridden; other keys in an override are ignored.
 */
export function applyEdits(releases: readonly Release[], edits: ReleaseEdits = {}): Release[] {
  return releases.map(release => {
    const overrides = edits[String(release.id)]
    if (!overrides) return release

    const copy: Release = { ...release }
    for (const field of REQUIRED_FIELDS) {
      const value = overrides[field]
      if (typeof value === 'string') {
        copy[field] = value
      }
    }
    return copy
  })
}

/**
 * Label caption: `{artist} – {title} [{year}]`, without the year when unknown
 */
export function formatBottomText(release: ValidRelease): string {
  const caption = `${release.artist} – ${release.title}`
  return isKnownYear(release.year) ? `${caption} [${release.year}]` : caption
}

/**
 * Values of the three per-release columns
 */
export function dataColumnsFor(release: ValidRelease): { BottomText: string; Content: string; FileName: string } {
  return {
    BottomText: formatBottomText(release),
    Content: release.url,
    FileName: String(release.id)
  }
}

export function toPreviewRow(release: ValidRelease): PreviewRow {
  const data = dataColumnsFor(release)
  return {
    id: release.id,
    artist: release.artist,
    title: release.title,
    year: release.year,
    url: release.url,
    bottomText: data.BottomText,
    content: data.Content,
    fileName: data.FileName
  }
}

/**
 * Render releases, in the order given, as QR-label CSV text
 */
export function renderCsv(releases: readonly ValidRelease[], template: CsvTemplate): string {
  assertTemplate(template)

  const lines = [formatCsvRow(template.columns)]

  for (const release of releases) {
    const row: Record<string, string> = { ...template.defaults, ...dataColumnsFor(release) }
    lines.push(formatCsvRow(template.columns.map(column => row[column] ?? '')))
  }

  return lines.join(CSV_RECORD_SEPARATOR) + CSV_RECORD_SEPARATOR
}

/**
 * Download name for an export, unique to the second
 */
export function exportFilename(now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `discogs_collection_${date}_${time}.csv`
}
