/**
 * POST /api/auth
 *
 * Sign in with an existing access token. Any value left out of the body is
 * taken from the server configuration.
 */

import { RequestSchemas, createBodyValidator, readString } from '~/lib/validation-utils'
import { defineApiRoute, ok } from '../utils/api-handler'

const readAuthBody = createBodyValidator(RequestSchemas.auth)

export default defineApiRoute('authenticate', async (event, { session, services }) => {
  const body = await readAuthBody(event)
  const configured = services.config.discogs

  const credentials = await services.client.authenticate({
    consumerKey: readString(body, 'consumerKey') || configured.consumerKey,
    consumerSecret: readString(body, 'consumerSecret') || configured.consumerSecret,
    token: readString(body, 'token') || configured.token,
    tokenSecret: readString(body, 'tokenSecret') || configured.tokenSecret
  })

  return ok(session.authenticate(credentials))
})
