import type { ReleaseId } from './release'

/**
 * A release left out of an export, with every field it was missing
 */
export interface RejectedRelease {
  id: ReleaseId
  missingFields: string[]
  message: string
}

/**
 * One row of the editable preview shown before rendering
 */
export interface PreviewRow {
  id: ReleaseId
  artist: string
  title: string
  year: number
  url: string
  bottomText: string
  content: string
  fileName: string
}

export interface PreviewResult {
  rows: PreviewRow[]
  rejected: RejectedRelease[]
}

/**
 * Outcome of rendering the selection to CSV
 */
export interface RenderResult {
  csv: string
  filename: string
  rowCount: number
  rejected: RejectedRelease[]
}

/**
 * Column layout and shared default values of the QR-label CSV
 */
export interface CsvTemplate {
  columns: string[]
  defaults: Record<string, string>
}
