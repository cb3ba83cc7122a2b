/**
 * POST /api/releases/sort
 *
 * Re-order the listed releases; the selection is kept
 */

import { RequestSchemas, createBodyValidator } from '~/lib/validation-utils'
import { DEFAULT_SORT } from '~/lib/export-session'
import { defineApiRoute, ok } from '../../utils/api-handler'
import { readSortCriterion } from '../../utils/request'

const readSortBody = createBodyValidator(RequestSchemas.sort)

export default defineApiRoute('sort-releases', async (event, { session }) => {
  const body = await readSortBody(event)
  const criterion = readSortCriterion(body.sort) ?? DEFAULT_SORT

  const releases = session.resort(criterion)

  return ok({
    sort: criterion,
    releases,
    letters: session.letterBuckets(),
    session: session.summary()
  })
})
