/**
 * GET /api/session
 *
 * Where the caller's export currently stands
 */

import { defineApiRoute, ok } from '../utils/api-handler'

export default defineApiRoute('session-summary', (_event, { session }) => ok(session.summary()))
