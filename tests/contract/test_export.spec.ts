import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { FakeCollectionClient } from '../helpers/fake-client'
import { startTestServer, type TestBrowser, type TestServer } from '../helpers/test-server'

/**
 * Contract test for selection, preview, edit and POST /api/export
 */
describe('Selection and export - Contract Test', () => {
  let server: TestServer
  let browser: TestBrowser

  beforeAll(async () => {
    server = await startTestServer({ client: new FakeCollectionClient() })
  })

  afterAll(async () => {
    await server.close()
  })

  beforeEach(async () => {
    browser = server.browser()
    await browser.request('/api/auth', { method: 'POST' })
    await browser.request('/api/folders/0/releases?sort=artist_asc')
  })

  it('selects by id and by letter, keeping listed order', async () => {
    const response = await browser.request('/api/selection', {
      method: 'POST',
      body: { releaseIds: [42], letters: { '#': true } }
    })

    expect(response.status).toBe(200)
    expect(response._data).toMatchObject({
      success: true,
      data: {
        selected: [3, 42],
        session: { stage: 'Selected', selectedCount: 2 }
      }
    })
  })

  it('answers 400 for ids outside the open folder', async () => {
    const response = await browser.request('/api/selection', { method: 'POST', body: { releaseIds: [1, 999] } })

    expect(response.status).toBe(400)
    expect(response._data).toMatchObject({ error: { code: 'VALIDATION_ERROR', details: { field: 'releaseIds' } } })
  })

  it('answers 400 for an empty selection request', async () => {
    const response = await browser.request('/api/selection', { method: 'POST', body: {} })

    expect(response.status).toBe(400)
  })

  it('refuses to export before a preview', async () => {
    await browser.request('/api/selection', { method: 'POST', body: { releaseIds: [1] } })

    const response = await browser.request('/api/export', { method: 'POST' })

    expect(response.status).toBe(409)
    expect(response._data).toMatchObject({
      success: false,
      error: { code: 'SEQUENCE_ERROR', details: { requiredStage: 'Previewed', currentStage: 'Selected' } }
    })
  })

  it('previews rows and lists rejected releases', async () => {
    await browser.request('/api/selection', { method: 'POST', body: { releaseIds: [42, 1, 4] } })

    const response = await browser.request('/api/preview', { method: 'POST', body: {} })

    expect(response.status).toBe(200)
    expect(response._data).toEqual({
      success: true,
      data: {
        rows: [
          {
            id: 1,
            artist: 'Portishead',
            title: 'Dummy',
            year: 1994,
            url: 'https://example.com/release/1',
            bottomText: 'Portishead – Dummy [1994]',
            content: 'https://example.com/release/1',
            fileName: '1'
          },
          {
            id: 42,
            artist: 'SOHN',
            title: 'Albadas',
            year: 2023,
            url: 'https://example.com/release/42',
            bottomText: 'SOHN – Albadas [2023]',
            content: 'https://example.com/release/42',
            fileName: '42'
          }
        ],
        rejected: [{ id: 4, missingFields: ['url'], message: 'Release 4 is missing url' }],
        session: {
          stage: 'Previewed',
          username: 'crate-digger',
          folder: { id: 0, name: 'All', count: 4 },
          releaseCount: 4,
          selectedCount: 3,
          sort: 'artist_asc'
        }
      }
    })
  })

  it('exports the previewed selection as a CSV attachment', async () => {
    await browser.request('/api/selection', { method: 'POST', body: { releaseIds: [42, 1, 4] } })
    await browser.request('/api/preview', { method: 'POST', body: {} })

    const response = await browser.request('/api/export', { method: 'POST' })

    expect(response.status).toBe(200)
    expect(response.headers.get('content-type')).toContain('text/csv')
    expect(response.headers.get('content-disposition'))
      .toMatch(/^attachment; filename="discogs_collection_\d{8}_\d{6}\.csv"$/)
    expect(response.headers.get('x-export-rows')).toBe('2')
    expect(response.headers.get('x-export-rejected')).toBe('1')

    const lines = String(response._data).split('\r\n')
    expect(lines).toHaveLength(4)
    expect(lines[0]?.startsWith('Type,OutputSize,FileType,')).toBe(true)
    expect(lines[2]).toBe(
      'URL,1024,PNG,RGB,0,M,True,0,Solid,Solid,#FFFFFF,#000000,#000000,0,,True,20,None,0,0,#FFFFFF,' +
      'SOHN – Albadas [2023],24,#000000,Arial,Regular,5,#FFFFFF,https://example.com/release/42,42'
    )
    expect(lines[3]).toBe('')
  })

  it('exports identical bytes when asked twice', async () => {
    await browser.request('/api/selection', { method: 'POST', body: { releaseIds: [1, 3] } })
    await browser.request('/api/preview', { method: 'POST', body: {} })

    const first = await browser.request('/api/export', { method: 'POST' })
    const second = await browser.request('/api/export', { method: 'POST' })

    expect(second.status).toBe(200)
    expect(second._data).toBe(first._data)
  })

  it('applies edits and requires a fresh preview after editing', async () => {
    await browser.request('/api/selection', { method: 'POST', body: { releaseIds: [4] } })
    await browser.request('/api/preview', { method: 'POST', body: {} })

    const edited = await browser.request('/api/edit', {
      method: 'POST',
      body: { edits: { '4': { url: 'https://example.com/release/4', title: '  Doolittle 25 ' } } }
    })
    expect(edited._data).toMatchObject({ success: true, data: { stage: 'Selected' } })

    const blocked = await browser.request('/api/export', { method: 'POST' })
    expect(blocked.status).toBe(409)

    const preview = await browser.request('/api/preview', { method: 'POST', body: {} })
    expect(preview._data).toMatchObject({
      data: {
        rows: [{ id: 4, title: 'Doolittle 25', bottomText: 'Pixies – Doolittle 25 [1989]' }],
        rejected: []
      }
    })

    const exported = await browser.request('/api/export', { method: 'POST' })
    expect(String(exported._data)).toContain(',Pixies – Doolittle 25 [1989],')
  })

  it('answers 400 for an edit with an invalid url', async () => {
    await browser.request('/api/selection', { method: 'POST', body: { releaseIds: [4] } })
    await browser.request('/api/preview', { method: 'POST', body: {} })

    const response = await browser.request('/api/edit', {
      method: 'POST',
      body: { edits: { '4': { url: 'not a url' } } }
    })

    expect(response.status).toBe(400)
    expect(response._data).toMatchObject({ error: { details: { field: 'edits.4.url' } } })
  })
})
