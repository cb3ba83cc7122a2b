/**
 * POST /api/export
 *
 * Render the previewed selection as the QR-label CSV download
 */

import { setHeaders } from 'h3'
import { useLogger } from '~/lib/logger'
import { Sanitizers } from '~/lib/validation-utils'
import { defineApiRoute } from '../utils/api-handler'

const logger = useLogger('export')

export default defineApiRoute('export-csv', (event, { session, services }) => {
  const result = session.render(services.template)

  setHeaders(event, {
    'Content-Type': 'text/csv; charset=utf-8',
    'Content-Disposition': `attachment; filename="${Sanitizers.filename(result.filename)}"`,
    'X-Export-Rows': String(result.rowCount),
    'X-Export-Rejected': String(result.rejected.length)
  })

  if (result.rejected.length > 0) {
    logger.warn(`Export left out ${result.rejected.length} release(s): ${result.rejected.map(r => r.id).join(', ')}`)
  }
  logger.info(`Exported ${result.rowCount} row(s) as ${result.filename}`)

  return result.csv
})
