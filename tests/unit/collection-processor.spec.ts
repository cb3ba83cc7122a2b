import { describe, expect, it } from 'vitest'
import {
  applyEdits,
  bucketFor,
  exportFilename,
  formatBottomText,
  groupByStartingLetter,
  partition,
  renderCsv,
  sort,
  toPreviewRow,
  validate
} from '~/lib/collection-processor'
import { loadTemplate, parseCsv } from '~/lib/csv-template'
import { TemplateError } from '~/lib/error-utils'
import type { CsvTemplate, Release, ValidRelease } from '~/types'
import { SOHN, makeRelease } from '../helpers/releases'

const template = loadTemplate()

function validOf(...releases: Release[]): ValidRelease[] {
  return partition(releases).valid
}

function only<T>(items: T[]): T {
  const [item] = items
  if (item === undefined) throw new Error('Expected one item')
  return item
}

describe('validate', () => {
  it('accepts a release with artist, title and url and trims them', () => {
    const result = validate(makeRelease({ id: 1, artist: '  Broadcast ', title: 'Tender Buttons ', url: ' https://example.com/r/1' }))

    expect(result.valid).toBe(true)
    if (result.valid) {
      expect(result.release.artist).toBe('Broadcast')
      expect(result.release.title).toBe('Tender Buttons')
      expect(result.release.url).toBe('https://example.com/r/1')
    }
  })

  it('names every missing field and the release id', () => {
    const result = validate(makeRelease({ id: 7, artist: 'Low', title: '   ', url: null }))

    expect(result.valid).toBe(false)
    if (!result.valid) {
      expect(result.error.missingFields).toEqual(['title', 'url'])
      expect(result.error.releaseId).toBe(7)
      expect(result.error.message).toBe('Release 7 is missing title, url')
    }
  })

  it('reports all three fields in a fixed order', () => {
    const result = validate(makeRelease({ id: 8, artist: null, title: null, url: '' }))

    expect(result.valid).toBe(false)
    if (!result.valid) {
      expect(result.error.missingFields).toEqual(['artist', 'title', 'url'])
    }
  })

  it('normalises an invalid year to unknown instead of failing', () => {
    const result = validate(makeRelease({ year: -3 }))

    expect(result.valid).toBe(true)
    if (result.valid) {
      expect(result.release.year).toBe(0)
    }
  })
})

describe('partition', () => {
  it('keeps input order on both sides', () => {
    const releases = [
      makeRelease({ id: 1 }),
      makeRelease({ id: 2, url: null }),
      makeRelease({ id: 3 }),
      makeRelease({ id: 4, artist: '' })
    ]

    const { valid, rejected } = partition(releases)

    expect(valid.map(release => release.id)).toEqual([1, 3])
    expect(rejected).toEqual([
      { id: 2, missingFields: ['url'], message: 'Release 2 is missing url' },
      { id: 4, missingFields: ['artist'], message: 'Release 4 is missing artist' }
    ])
  })
})

describe('sort', () => {
  it('sorts by artist case-insensitively', () => {
    const releases = [
      makeRelease({ id: 1, artist: 'beta' }),
      makeRelease({ id: 2, artist: 'Alpha' }),
      makeRelease({ id: 3, artist: 'gamma' })
    ]

    expect(sort(releases, 'artist_asc').map(release => release.id)).toEqual([2, 1, 3])
  })

  it('reverses the order of distinct artists between asc and desc', () => {
    const releases = ['Yo La Tengo', 'air', 'Cocteau Twins', 'broadcast', 'Mogwai'].map((artist, index) =>
      makeRelease({ id: index + 1, artist }))

    const ascending = sort(releases, 'artist_asc').map(release => release.id)
    const descending = sort(sort(releases, 'artist_asc'), 'artist_desc').map(release => release.id)

    expect(ascending).toEqual([2, 4, 3, 5, 1])
    expect(descending).toEqual([...ascending].reverse())
  })

  it('breaks artist ties by title ascending in both directions', () => {
    const releases = [
      makeRelease({ id: 1, artist: 'Same', title: 'b-side' }),
      makeRelease({ id: 2, artist: 'Zed', title: 'Only' }),
      makeRelease({ id: 3, artist: 'same', title: 'A-side' })
    ]

    expect(sort(releases, 'artist_asc').map(release => release.id)).toEqual([3, 1, 2])
    expect(sort(releases, 'artist_desc').map(release => release.id)).toEqual([2, 3, 1])
  })

  it('puts unknown years last in both year orders', () => {
    const releases = [
      makeRelease({ id: 1, year: 1999 }),
      makeRelease({ id: 2, year: 0 }),
      makeRelease({ id: 3, year: 2020 }),
      makeRelease({ id: 4, year: 0 })
    ]

    expect(sort(releases, 'year_desc').map(release => release.id)).toEqual([3, 1, 2, 4])
    expect(sort(releases, 'year_asc').map(release => release.id)).toEqual([1, 3, 2, 4])
  })

  it('sorts by date added, newest first, missing dates last', () => {
    const releases = [
      makeRelease({ id: 1, dateAdded: '2024-01-01T00:00:00Z' }),
      makeRelease({ id: 2, dateAdded: null }),
      makeRelease({ id: 3, dateAdded: '2024-05-01T00:00:00Z' }),
      makeRelease({ id: 4, dateAdded: 'not a date' })
    ]

    expect(sort(releases, 'date_added_desc').map(release => release.id)).toEqual([3, 1, 2, 4])
  })

  it('does not mutate its input', () => {
    const releases = [makeRelease({ id: 1, artist: 'b' }), makeRelease({ id: 2, artist: 'a' })]

    sort(releases, 'artist_asc')

    expect(releases.map(release => release.id)).toEqual([1, 2])
  })
})

describe('groupByStartingLetter', () => {
  it('buckets by upper-cased first letter with # first', () => {
    const releases = [
      makeRelease({ id: 1, artist: 'Zappa' }),
      makeRelease({ id: 2, artist: '3 Doors Down' }),
      makeRelease({ id: 3, artist: 'abba' }),
      makeRelease({ id: 4, artist: '  beck' }),
      makeRelease({ id: 5, artist: '' }),
      makeRelease({ id: 6, artist: 'Björk' }),
      makeRelease({ id: 7, artist: null })
    ]

    const groups = groupByStartingLetter(releases)

    expect([...groups.keys()]).toEqual(['#', 'A', 'B', 'Z'])
    expect(groups.get('#')?.map(release => release.id)).toEqual([2, 5, 7])
    expect(groups.get('B')?.map(release => release.id)).toEqual([4, 6])
  })

  it('puts every release in exactly one bucket', () => {
    const releases = ['!!!', 'Autechre', 'autechre', '808 State', 'Ólafur Arnalds', 'Mogwai'].map((artist, index) =>
      makeRelease({ id: index + 1, artist }))

    const groups = groupByStartingLetter(releases)
    const ids = [...groups.values()].flat().map(release => release.id)

    expect(ids).toHaveLength(releases.length)
    expect(new Set(ids)).toEqual(new Set(releases.map(release => release.id)))
    expect(bucketFor('Ólafur Arnalds')).toBe('Ó')
  })
})

describe('applyEdits', () => {
  it('overrides artist, title and url on copies only', () => {
    const original = makeRelease({ id: 5, artist: 'Wrong', title: 'Right' })
    const edits = { '5': { artist: 'Fixed', label: 'ignored' } }

    const [edited] = applyEdits([original], edits)

    expect(edited).toEqual({ ...original, artist: 'Fixed' })
    expect(original.artist).toBe('Wrong')
  })

  it('lets an edit fill a missing field so the release validates', () => {
    const incomplete = makeRelease({ id: 9, url: null })

    const { valid, rejected } = partition(applyEdits([incomplete], { '9': { url: 'https://example.com/fixed' } }))

    expect(rejected).toEqual([])
    expect(valid[0]?.url).toBe('https://example.com/fixed')
  })
})

describe('formatBottomText', () => {
  it('includes the year when known', () => {
    expect(formatBottomText(only(validOf(SOHN)))).toBe('SOHN – Albadas [2023]')
  })

  it('omits the year when unknown', () => {
    const release = only(validOf(makeRelease({ artist: 'Burial', title: 'Untrue', year: 0 })))
    expect(formatBottomText(release)).toBe('Burial – Untrue')
  })
})

describe('renderCsv', () => {
  it('renders the data columns of a release', () => {
    const csv = renderCsv(validOf(SOHN), template)
    const [header, row] = parseCsv(csv)

    expect(header).toEqual(template.columns)
    const value = (column: string) => row?.[template.columns.indexOf(column)]
    expect(value('BottomText')).toBe('SOHN – Albadas [2023]')
    expect(value('Content')).toBe('https://example.com/release/42')
    expect(value('FileName')).toBe('42')
    expect(toPreviewRow(only(validOf(SOHN))).fileName).toBe('42')
  })

  it('copies the template defaults into every row', () => {
    const csv = renderCsv(validOf(SOHN), template)

    expect(csv.split('\r\n')[1]).toBe(
      'URL,1024,PNG,RGB,0,M,True,0,Solid,Solid,#FFFFFF,#000000,#000000,0,,True,20,None,0,0,#FFFFFF,' +
      'SOHN – Albadas [2023],24,#000000,Arial,Regular,5,#FFFFFF,https://example.com/release/42,42'
    )
  })

  it('ends every record with CRLF and emits one row per release', () => {
    const releases = validOf(SOHN, makeRelease({ id: 2 }), makeRelease({ id: 3 }))
    const csv = renderCsv(releases, template)

    expect(csv.endsWith('\r\n')).toBe(true)
    expect(csv.split('\r\n')).toHaveLength(releases.length + 2)
    expect(csv.split('\r\n')[0]).toBe(template.columns.join(','))
  })

  it('quotes fields with commas and doubles embedded quotes', () => {
    const releases = validOf(makeRelease({ id: 11, artist: 'Crosby, Stills & Nash', title: 'Say "Hi"', year: 1970 }))
    const csv = renderCsv(releases, template)

    expect(csv).toContain(',"Crosby, Stills & Nash – Say ""Hi"" [1970]",')
  })

  it('keeps the caller order', () => {
    const releases = validOf(makeRelease({ id: 3 }), makeRelease({ id: 1 }), makeRelease({ id: 2 }))
    const rows = parseCsv(renderCsv(releases, template)).slice(1)
    const fileNameIndex = template.columns.indexOf('FileName')

    expect(rows.map(row => row[fileNameIndex])).toEqual(['3', '1', '2'])
  })

  it('produces identical text for the same selection', () => {
    const releases = validOf(SOHN, makeRelease({ id: 77, artist: 'Nils Frahm', title: 'Spaces', year: 2013 }))

    expect(renderCsv(releases, template)).toBe(renderCsv(releases, template))
  })

  it('fails on every call when the template has no Content column', () => {
    const broken: CsvTemplate = {
      columns: template.columns.filter(column => column !== 'Content'),
      defaults: Object.fromEntries(Object.entries(template.defaults).filter(([column]) => column !== 'Content'))
    }

    expect(() => renderCsv([], broken)).toThrow(TemplateError)
    expect(() => renderCsv(validOf(SOHN), broken)).toThrow(TemplateError)
    expect(() => renderCsv(validOf(SOHN), broken)).toThrow(/Missing data column: Content/)
  })
})

describe('exportFilename', () => {
  it('stamps the local date and time', () => {
    expect(exportFilename(new Date(2024, 0, 5, 9, 3, 7))).toBe('discogs_collection_20240105_090307.csv')
  })
})
