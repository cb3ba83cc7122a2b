/**
 * POST /api/edit
 *
 * Record edits after a preview. The preview has to be requested again
 * before the export.
 */

import { ValidationError } from '~/lib/error-utils'
import { RequestSchemas, createBodyValidator } from '~/lib/validation-utils'
import { defineApiRoute, ok } from '../utils/api-handler'
import { readEdits } from '../utils/request'

const readEditsBody = createBodyValidator(RequestSchemas.edits, { strict: false })

export default defineApiRoute('edit-releases', async (event, { session }) => {
  const body = await readEditsBody(event)
  if (body.edits === undefined) {
    throw new ValidationError('Field \'edits\' is required', { field: 'edits' })
  }

  return ok(session.edit(readEdits(body.edits)))
})
