import type { Folder } from './folder'

/**
 * Ordered stages of one export session. A stage can only be reached
 * once every stage before it has produced its output.
 */
export const EXPORT_STAGES = [
  'Unauthenticated',
  'Authenticated',
  'FolderChosen',
  'ReleasesListed',
  'Selected',
  'Previewed',
  'Rendered'
] as const

export type ExportStage = typeof EXPORT_STAGES[number]

/**
 * Signed-request material for the collection API
 */
export interface Credentials {
  consumerKey: string
  consumerSecret: string
  token: string
  tokenSecret: string
  username: string
}

/**
 * Request token held between the authorize redirect and the callback
 */
export interface PendingAuthorization {
  consumerKey: string
  consumerSecret: string
  requestToken: string
  requestTokenSecret: string
  authorizeUrl: string
}

/**
 * Read-only view of a session returned to API callers
 */
export interface SessionSummary {
  stage: ExportStage
  username: string | null
  folder: Folder | null
  releaseCount: number
  selectedCount: number
  sort: string | null
}
