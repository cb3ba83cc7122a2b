/**
 * Runtime configuration
 *
 * Typed view of the environment. Values are read once per process; tests
 * build their own with `readRuntimeConfig`.
 */

import { DEFAULT_TEMPLATE_PATH } from '~/lib/csv-template'

export interface DiscogsConfig {
  consumerKey: string
  consumerSecret: string
  token: string
  tokenSecret: string
  userAgent: string
}

export interface RuntimeConfig {
  discogs: DiscogsConfig
  publicAppUrl: string
  port: number
  sessionTtl: number          // Seconds of inactivity before a session is dropped
  responseCacheTtl: number    // Seconds; 0 disables response caching
  requestTimeout: number      // Milliseconds per outbound request
  templatePath: string
  environment: string
}

type Env = Record<string, string | undefined>

function readInteger(env: Env, key: string, fallback: number): number {
  const value = Number.parseInt(env[key] ?? '', 10)
  return Number.isInteger(value) && value >= 0 ? value : fallback
}

export function readRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const port = readInteger(env, 'PORT', 3000)

  return {
    discogs: {
      consumerKey: env.DISCOGS_CONSUMER_KEY ?? '',
      consumerSecret: env.DISCOGS_CONSUMER_SECRET ?? '',
      token: env.DISCOGS_OAUTH_TOKEN ?? '',
      tokenSecret: env.DISCOGS_OAUTH_TOKEN_SECRET ?? '',
      userAgent: env.DISCOGS_USER_AGENT || 'discogs-qr-labels/1.0'
    },
    publicAppUrl: (env.PUBLIC_APP_URL || `http://localhost:${port}`).replace(/\/+$/, ''),
    port,
    sessionTtl: readInteger(env, 'SESSION_TTL', 3600),
    responseCacheTtl: readInteger(env, 'RESPONSE_CACHE_TTL', 300),
    requestTimeout: readInteger(env, 'REQUEST_TIMEOUT', 10000),
    templatePath: env.TEMPLATE_PATH || DEFAULT_TEMPLATE_PATH,
    environment: env.NODE_ENV || 'development'
  }
}

let runtimeConfig: RuntimeConfig | null = null

export function useRuntimeConfig(): RuntimeConfig {
  if (!runtimeConfig) {
    runtimeConfig = readRuntimeConfig()
  }

  return runtimeConfig
}
