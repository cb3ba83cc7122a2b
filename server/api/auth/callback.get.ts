/**
 * GET /api/auth/callback?oauth_token=&oauth_verifier=
 *
 * Finish the web authorization flow started by /api/auth/authorize
 */

import { getQuery } from 'h3'
import { AuthError } from '~/lib/error-utils'
import { defineApiRoute, ok } from '../../utils/api-handler'

export default defineApiRoute('complete-authorization', async (event, { session, services }) => {
  const query = getQuery(event)
  const requestToken = typeof query.oauth_token === 'string' ? query.oauth_token : ''
  const verifier = typeof query.oauth_verifier === 'string' ? query.oauth_verifier : ''

  const pending = session.pendingAuthorization
  if (!pending || pending.requestToken !== requestToken) {
    throw new AuthError('No authorization in progress for this request token', 'unknown_request_token')
  }

  const credentials = await services.client.completeAuthorization(pending, verifier)
  return ok(session.authenticate(credentials))
})
