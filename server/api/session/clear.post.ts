/**
 * POST /api/session/clear
 *
 * Forget the signed-in user and everything derived from them, including
 * the collection responses cached for that user
 */

import { defineApiRoute, ok } from '../../utils/api-handler'

export default defineApiRoute('clear-session', (_event, { session, services }) => {
  const { username } = session.summary()
  if (username) {
    services.client.forgetUser(username)
  }

  return ok(session.clear())
})
