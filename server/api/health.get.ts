/**
 * GET /api/health
 *
 * Health check for monitoring: template state, live sessions and error
 * counters since start.
 */

import { verifyTemplate } from '~/lib/csv-template'
import { defineApiRoute, ok } from '../utils/api-handler'

export default defineApiRoute('health-check', (_event, { services }) => {
  const templateProblems = verifyTemplate(services.template)
  const errors = services.errorHandler.getMetrics()

  return ok({
    status: templateProblems.length === 0 ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    uptime: Math.round((Date.now() - services.startedAt) / 1000),
    version: '1.0.0',
    environment: services.config.environment,
    checks: {
      template: {
        healthy: templateProblems.length === 0,
        columns: services.template.columns.length,
        problems: templateProblems
      },
      sessions: {
        healthy: true,
        active: services.sessions.size
      }
    },
    errors: {
      total: errors.totalErrors,
      byType: errors.errorsByType
    }
  })
})
