/**
 * POST /api/selection
 *
 * Body: `{ releaseIds?: id[], letters?: { [letter]: boolean } }`. The ids
 * replace the selection first; letter toggles are applied after them in
 * the order given.
 */

import { ValidationError } from '~/lib/error-utils'
import { RequestSchemas, createBodyValidator } from '~/lib/validation-utils'
import { defineApiRoute, ok } from '../utils/api-handler'
import { readLetters, readReleaseIds } from '../utils/request'

const readSelectionBody = createBodyValidator(RequestSchemas.selection)

export default defineApiRoute('select-releases', async (event, { session }) => {
  const body = await readSelectionBody(event)
  const releaseIds = readReleaseIds(body.releaseIds)
  const letters = readLetters(body.letters)

  if (releaseIds === null && letters.length === 0) {
    throw new ValidationError('Provide releaseIds or letters to select', { field: 'releaseIds' })
  }

  if (releaseIds !== null) {
    session.select(releaseIds)
  }
  for (const [letter, selected] of letters) {
    session.toggleLetter(letter, selected)
  }

  return ok({
    selected: session.selectedReleases().map(release => release.id),
    letters: session.letterBuckets(),
    session: session.summary()
  })
})
