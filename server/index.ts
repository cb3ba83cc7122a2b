/**
 * Server entry point
 */

import 'dotenv/config'
import { createServer } from 'node:http'
import { toNodeListener } from 'h3'
import { loadTemplate } from '~/lib/csv-template'
import { useLogger } from '~/lib/logger'
import { createServerApp } from './app'
import { useRuntimeConfig } from './utils/runtime-config'

const logger = useLogger('server')
const config = useRuntimeConfig()

if (!config.discogs.consumerKey || !config.discogs.consumerSecret) {
  logger.warn('DISCOGS_CONSUMER_KEY / DISCOGS_CONSUMER_SECRET are not set; only POST /api/auth with explicit keys will work')
}

const template = loadTemplate(config.templatePath)
logger.info(`Loaded QR-label template with ${template.columns.length} columns from ${config.templatePath}`)

const { app, services } = createServerApp({ config, template })
const server = createServer(toNodeListener(app))

server.listen(config.port, () => {
  logger.success(`Listening on ${config.publicAppUrl} (port ${config.port})`)
})

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`)
  services.sessions.destroy()
  server.close(() => process.exit(0))
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
