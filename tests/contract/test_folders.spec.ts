import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { FakeCollectionClient } from '../helpers/fake-client'
import { startTestServer, type TestBrowser, type TestServer } from '../helpers/test-server'

/**
 * Contract test for GET /api/folders, GET /api/folders/:id/releases and
 * POST /api/releases/sort
 */
describe('Folders and releases - Contract Test', () => {
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
  })

  it('lists the folders of the signed-in user', async () => {
    const response = await browser.request('/api/folders')

    expect(response.status).toBe(200)
    expect(response._data).toEqual({
      success: true,
      data: {
        folders: [
          { id: 0, name: 'All', count: 4 },
          { id: 7, name: 'Singles', count: 0 }
        ]
      }
    })
  })

  it('opens a folder with its releases sorted and grouped', async () => {
    const response = await browser.request('/api/folders/0/releases?sort=artist_asc')

    expect(response.status).toBe(200)
    expect(response._data).toMatchObject({
      success: true,
      data: {
        folder: { id: 0, name: 'All', count: 4 },
        sort: 'artist_asc',
        releases: [{ id: 3 }, { id: 4 }, { id: 1 }, { id: 42 }],
        letters: [
          { letter: '#', releaseIds: [3], selected: 0 },
          { letter: 'P', releaseIds: [4, 1], selected: 0 },
          { letter: 'S', releaseIds: [42], selected: 0 }
        ],
        session: { stage: 'ReleasesListed', releaseCount: 4, selectedCount: 0 }
      }
    })
  })

  it('defaults to artist order', async () => {
    const response = await browser.request('/api/folders/0/releases')

    expect(response._data).toMatchObject({ data: { sort: 'artist_asc' } })
  })

  it('re-sorts the listed releases', async () => {
    await browser.request('/api/folders/0/releases')

    const response = await browser.request('/api/releases/sort', { method: 'POST', body: { sort: 'year_desc' } })

    expect(response.status).toBe(200)
    expect(response._data).toMatchObject({
      data: {
        sort: 'year_desc',
        releases: [{ id: 42 }, { id: 3 }, { id: 1 }, { id: 4 }]
      }
    })
  })

  it('answers 409 when sorting before a folder is open', async () => {
    const response = await browser.request('/api/releases/sort', { method: 'POST', body: { sort: 'year_desc' } })

    expect(response.status).toBe(409)
    expect(response._data).toMatchObject({ error: { details: { requiredStage: 'ReleasesListed', currentStage: 'Authenticated' } } })
  })

  it('answers 404 for a folder that does not exist', async () => {
    const response = await browser.request('/api/folders/99/releases')

    expect(response.status).toBe(404)
    expect(response._data).toMatchObject({ success: false, error: { code: 'NOT_FOUND' } })
  })

  it('answers 400 for a malformed folder id or sort', async () => {
    const badId = await browser.request('/api/folders/abc/releases')
    const badSort = await browser.request('/api/folders/0/releases?sort=random')

    expect(badId.status).toBe(400)
    expect(badSort.status).toBe(400)
    expect(badSort._data).toMatchObject({ error: { code: 'VALIDATION_ERROR', details: { field: 'sort' } } })
  })
})
