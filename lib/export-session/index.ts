/**
 * Export Session
 *
 * Per-user state of one export: who is signed in, which folder is open, the
 * listed releases, the selection and the pending edits. Each operation
 * checks the stage it needs before touching anything, so a call made out of
 * order fails with a SequenceError and leaves the session as it was.
 *
 * Stages only move forward through the operation that produces their
 * output. Going back (choosing another folder, re-sorting, editing) discards
 * whatever was derived from the state that changed.
 */

import {
  applyEdits,
  exportFilename,
  groupByStartingLetter,
  partition,
  renderCsv,
  sort,
  toPreviewRow
} from '~/lib/collection-processor'
import { SequenceError, ValidationError } from '~/lib/error-utils'
import {
  EXPORT_STAGES,
  type Credentials,
  type CsvTemplate,
  type ExportStage,
  type Folder,
  type PendingAuthorization,
  type PreviewResult,
  type Release,
  type ReleaseEdits,
  type ReleaseId,
  type RenderResult,
  type SessionSummary,
  type SortCriterion
} from '~/types'

export const DEFAULT_SORT: SortCriterion = 'artist_asc'

export interface LetterBucket {
  letter: string
  releaseIds: ReleaseId[]
  selected: number
}

function stageIndex(stage: ExportStage): number {
  return EXPORT_STAGES.indexOf(stage)
}

export class ExportSession {
  private stage: ExportStage = 'Unauthenticated'
  private credentials: Credentials | null = null
  private pending: PendingAuthorization | null = null
  private folder: Folder | null = null
  private releases: Release[] = []
  private criterion: SortCriterion | null = null
  private selection = new Set<string>()
  private edits: ReleaseEdits = {}

  get currentStage(): ExportStage {
    return this.stage
  }

  get pendingAuthorization(): PendingAuthorization | null {
    return this.pending
  }

  /**
   * Whether anything worth keeping has happened yet
   */
  get isStarted(): boolean {
    return this.stage !== 'Unauthenticated' || this.pending !== null
  }

  /**
   * Start over as the given user; allowed from any stage
   */
  authenticate(credentials: Credentials): SessionSummary {
    this.reset()
    this.credentials = credentials
    this.stage = 'Authenticated'
    return this.summary()
  }

  /**
   * Remember the request token of a web authorization in progress
   */
  setPendingAuthorization(pending: PendingAuthorization | null): void {
    this.pending = pending
  }

  requireCredentials(operation: string): Credentials {
    this.requireStage(operation, 'Authenticated')
    if (!this.credentials) {
      throw new SequenceError(operation, 'Authenticated', 'Unauthenticated')
    }
    return this.credentials
  }

  chooseFolder(folder: Folder): SessionSummary {
    this.requireStage('choose a folder', 'Authenticated')

    this.folder = folder
    this.releases = []
    this.criterion = null
    this.selection.clear()
    this.edits = {}
    this.stage = 'FolderChosen'
    return this.summary()
  }

  /**
   * Store the releases of the chosen folder in the given order. Listing
   * again replaces the previous list and its selection.
   */
  listReleases(releases: readonly Release[], criterion: SortCriterion = DEFAULT_SORT): Release[] {
    this.requireStage('list releases', 'FolderChosen')

    this.releases = sort(releases, criterion)
    this.criterion = criterion
    this.selection.clear()
    this.edits = {}
    this.stage = 'ReleasesListed'
    return this.listedReleases()
  }

  /**
   * Re-order the listed releases. The selection survives; a preview made
   * in the old order does not.
   */
  resort(criterion: SortCriterion): Release[] {
    this.requireStage('sort releases', 'ReleasesListed')

    this.releases = sort(this.releases, criterion)
    this.criterion = criterion
    this.dropBackTo('Selected')
    return this.listedReleases()
  }

  /**
   * Replace the selection with the given releases
   */
  select(releaseIds: readonly ReleaseId[]): SessionSummary {
    this.requireStage('select releases', 'ReleasesListed')

    const known = new Set(this.releases.map(release => String(release.id)))
    const requested = releaseIds.map(String)
    const unknown = requested.filter(id => !known.has(id))
    if (unknown.length > 0) {
      throw new ValidationError(`Releases not in the listed folder: ${unknown.join(', ')}`, {
        field: 'releaseIds',
        value: unknown
      })
    }

    this.selection = new Set(requested)
    this.afterSelectionChange()
    return this.summary()
  }

  /**
   * Add or remove every release of a starting-letter bucket
   */
  toggleLetter(letter: string, selected: boolean): SessionSummary {
    this.requireStage('select by letter', 'ReleasesListed')

    const key = letter.trim().toUpperCase()
    const bucket = groupByStartingLetter(this.releases).get(key)
    if (!bucket) {
      throw new ValidationError(`No listed release starts with ${letter}`, { field: 'letters', value: letter })
    }

    for (const release of bucket) {
      if (selected) {
        this.selection.add(String(release.id))
      } else {
        this.selection.delete(String(release.id))
      }
    }

    this.afterSelectionChange()
    return this.summary()
  }

  letterBuckets(): LetterBucket[] {
    this.requireStage('group releases', 'ReleasesListed')

    return [...groupByStartingLetter(this.releases)].map(([letter, releases]) => ({
      letter,
      releaseIds: releases.map(release => release.id),
      selected: releases.filter(release => this.selection.has(String(release.id))).length
    }))
  }

  /**
   * Selected releases with edits applied, validated, as preview rows
   */
  preview(edits: ReleaseEdits = {}): PreviewResult {
    this.requireStage('preview the export', 'Selected')

    this.mergeEdits(edits)
    const { valid, rejected } = partition(applyEdits(this.selectedReleases(), this.edits))
    this.stage = 'Previewed'
    return { rows: valid.map(toPreviewRow), rejected }
  }

  /**
   * Record further edits after a preview; the preview has to be made again
   */
  edit(edits: ReleaseEdits): SessionSummary {
    this.requireStage('edit releases', 'Previewed')

    this.mergeEdits(edits)
    this.stage = 'Selected'
    return this.summary()
  }

  render(template: CsvTemplate, now: Date = new Date()): RenderResult {
    this.requireStage('render the export', 'Previewed')

    const { valid, rejected } = partition(applyEdits(this.selectedReleases(), this.edits))
    const csv = renderCsv(valid, template)
    this.stage = 'Rendered'

    return {
      csv,
      filename: exportFilename(now),
      rowCount: valid.length,
      rejected
    }
  }

  /**
   * Forget everything, credentials included
   */
  clear(): SessionSummary {
    this.reset()
    this.credentials = null
    this.stage = 'Unauthenticated'
    return this.summary()
  }

  listedReleases(): Release[] {
    return [...this.releases]
  }

  /**
   * Selected releases in listed order
   */
  selectedReleases(): Release[] {
    return this.releases.filter(release => this.selection.has(String(release.id)))
  }

  summary(): SessionSummary {
    return {
      stage: this.stage,
      username: this.credentials?.username ?? null,
      folder: this.folder,
      releaseCount: this.releases.length,
      selectedCount: this.selection.size,
      sort: this.criterion
    }
  }

  private requireStage(operation: string, required: ExportStage): void {
    if (stageIndex(this.stage) < stageIndex(required)) {
      throw new SequenceError(operation, required, this.stage)
    }
  }

  private dropBackTo(stage: ExportStage): void {
    if (stageIndex(this.stage) > stageIndex(stage)) {
      this.stage = stage
    }
  }

  private afterSelectionChange(): void {
    this.stage = this.selection.size > 0 ? 'Selected' : 'ReleasesListed'
  }

  private mergeEdits(edits: ReleaseEdits): void {
    const known = new Set(this.releases.map(release => String(release.id)))
    const unknown = Object.keys(edits).filter(id => !known.has(id))
    if (unknown.length > 0) {
      throw new ValidationError(`Edits for releases not in the listed folder: ${unknown.join(', ')}`, {
        field: 'edits',
        value: unknown
      })
    }

    for (const [id, overrides] of Object.entries(edits)) {
      this.edits[id] = { ...this.edits[id], ...overrides }
    }
  }

  private reset(): void {
    this.pending = null
    this.folder = null
    this.releases = []
    this.criterion = null
    this.selection = new Set()
    this.edits = {}
  }
}

export function createExportSession(): ExportSession {
  return new ExportSession()
}
