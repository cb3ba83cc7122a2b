/**
 * Release identifiers arrive as numbers from the API but may be strings
 * once they have travelled through a form or a query string.
 */
export type ReleaseId = number | string

/**
 * A single item of a collection folder.
 */
export interface Release {
  id: ReleaseId
  artist: string | null         // Combined artist credit
  title: string | null
  year: number                  // 0 when unknown
  url: string | null            // Canonical release page
  dateAdded: string | null      // ISO timestamp of when it entered the folder
  format: string | null         // First format name, e.g. "Vinyl"
  label: string | null          // First label name
}

/**
 * A release that carries every field the CSV export needs.
 */
export interface ValidRelease extends Release {
  artist: string
  title: string
  url: string
}

/**
 * Fields a user may override before the CSV is rendered
 */
export type ReleaseEditableField = 'artist' | 'title' | 'url'

export type ReleaseOverrides = Partial<Record<ReleaseEditableField, string>>

/**
 * Overrides keyed by release id (stringified)
 */
export type ReleaseEdits = Record<string, ReleaseOverrides>

export type SortCriterion =
  | 'artist_asc'
  | 'artist_desc'
  | 'year_desc'
  | 'year_asc'
  | 'date_added_desc'
