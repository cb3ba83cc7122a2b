/**
 * GET /api/auth/authorize
 *
 * Start the web authorization flow with the configured application keys.
 * The client sends the user to `authorizeUrl`; Discogs then redirects back
 * to /api/auth/callback.
 */

import { defineApiRoute, ok } from '../../utils/api-handler'

export default defineApiRoute('begin-authorization', async (_event, { session, services }) => {
  const { consumerKey, consumerSecret } = services.config.discogs
  const callbackUrl = `${services.config.publicAppUrl}/api/auth/callback`

  const pending = await services.client.beginAuthorization({ consumerKey, consumerSecret }, callbackUrl)
  session.setPendingAuthorization(pending)

  return ok({ authorizeUrl: pending.authorizeUrl })
})
