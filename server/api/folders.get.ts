/**
 * GET /api/folders?refresh=
 *
 * Folders of the signed-in user's collection
 */

import { getQuery } from 'h3'
import { defineApiRoute, ok } from '../utils/api-handler'
import { readFlag } from '../utils/request'

export default defineApiRoute('list-folders', async (event, { session, services }) => {
  const credentials = session.requireCredentials('list folders')
  const folders = await services.client.getFolders(credentials, { refresh: readFlag(getQuery(event).refresh) })

  return ok({ folders })
})
