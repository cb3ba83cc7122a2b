/**
 * POST /api/preview
 *
 * Body: `{ edits?: { [releaseId]: { artist?, title?, url? } } }`. Returns
 * the rows the export will contain and the releases it will leave out.
 */

import { RequestSchemas, createBodyValidator } from '~/lib/validation-utils'
import { defineApiRoute, ok } from '../utils/api-handler'
import { readEdits } from '../utils/request'

const readEditsBody = createBodyValidator(RequestSchemas.edits, { strict: false })

export default defineApiRoute('preview-export', async (event, { session }) => {
  const body = await readEditsBody(event)
  const preview = session.preview(readEdits(body.edits))

  return ok({
    ...preview,
    session: session.summary()
  })
})
