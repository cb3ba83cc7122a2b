/**
 * HTTP application
 *
 * Wires the API routes to the services they need. `createServerApp` takes
 * every collaborator from its caller, so tests run the same app with a fake
 * collection client.
 */

import { createApp, createRouter, type App } from 'h3'
import { createCacheManager } from '~/lib/cache-manager'
import { createDiscogsClient, type CollectionClient } from '~/lib/discogs-client'
import { useErrorHandler, type ErrorHandler } from '~/lib/error-utils'
import type { CsvTemplate } from '~/types'
import { createApiMiddleware } from './middleware/api-middleware'
import { createErrorResponder } from './middleware/error-handler'
import type { ApiRoute, ServerServices } from './utils/api-handler'
import type { RuntimeConfig } from './utils/runtime-config'
import { createSessionStore, type SessionStore } from './utils/session'

import authorize from './api/auth/authorize.get'
import authCallback from './api/auth/callback.get'
import authenticate from './api/auth.post'
import editReleases from './api/edit.post'
import exportCsv from './api/export.post'
import listFolders from './api/folders.get'
import listReleases from './api/folders/[id]/releases.get'
import health from './api/health.get'
import preview from './api/preview.post'
import sortReleases from './api/releases/sort.post'
import selection from './api/selection.post'
import clearSession from './api/session/clear.post'
import sessionSummary from './api/session.get'

export interface ServerAppOptions {
  config: RuntimeConfig
  template: CsvTemplate
  client?: CollectionClient
  sessions?: SessionStore
  errorHandler?: ErrorHandler
}

export interface ServerApp {
  app: App
  services: ServerServices
}

const routes: [method: 'get' | 'post', path: string, route: ApiRoute][] = [
  ['get', '/api/health', health],
  ['get', '/api/session', sessionSummary],
  ['post', '/api/auth', authenticate],
  ['get', '/api/auth/authorize', authorize],
  ['get', '/api/auth/callback', authCallback],
  ['get', '/api/folders', listFolders],
  ['get', '/api/folders/:id/releases', listReleases],
  ['post', '/api/releases/sort', sortReleases],
  ['post', '/api/selection', selection],
  ['post', '/api/preview', preview],
  ['post', '/api/edit', editReleases],
  ['post', '/api/export', exportCsv],
  ['post', '/api/session/clear', clearSession]
]

export function createServerApp(options: ServerAppOptions): ServerApp {
  const { config, template } = options
  const errorHandler = options.errorHandler ?? useErrorHandler()

  const client = options.client ?? createDiscogsClient({
    userAgent: config.discogs.userAgent,
    timeout: config.requestTimeout,
    responseTtl: config.responseCacheTtl,
    cache: createCacheManager({ defaultTtl: config.responseCacheTtl })
  })

  const sessions = options.sessions ?? createSessionStore(
    createCacheManager({ defaultTtl: config.sessionTtl, maxEntries: 10000, cleanupInterval: 60 }),
    { ttl: config.sessionTtl, secure: config.publicAppUrl.startsWith('https://') }
  )

  const services: ServerServices = {
    client,
    template,
    sessions,
    config,
    errorHandler,
    startedAt: Date.now()
  }

  const app = createApp({ onError: createErrorResponder(errorHandler) })
  app.use(createApiMiddleware(config))

  const router = createRouter()
  for (const [method, path, route] of routes) {
    router[method](path, route(services))
  }
  app.use(router.handler)

  return { app, services }
}
