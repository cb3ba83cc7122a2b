/**
 * Discogs API Client Library
 *
 * Signed access to a user's Discogs collection: folders, the releases in a
 * folder, and single releases, returned as plain typed records.
 *
 * Features:
 * - OAuth 1.0a with the PLAINTEXT signature method (HTTPS only)
 * - Web authorization flow (request token, authorize URL, access token)
 * - Complete folder listings across every result page, or an error
 * - Fail-closed deserialization of every response
 * - Per-user rate limiting and short-lived response caching
 * - Error classification (auth, not found, rate limit, upstream)
 */

import { randomBytes } from 'node:crypto'
import { FetchError, createFetch, type $Fetch } from 'ofetch'
import { CacheKeys, type CacheManager } from '~/lib/cache-manager'
import { ApiError, AppError, AuthError, RateLimitError } from '~/lib/error-utils'
import { useLogger } from '~/lib/logger'
import { RateLimiter, createDiscogsRateLimiter } from '~/lib/rate-limiter'
import {
  DiscogsPayloadSchemas,
  DiscogsSchemas,
  isRecord,
  readNumber,
  readRecords,
  readString,
  useValidator,
  type ValidationSchema
} from '~/lib/validation-utils'
import type { Credentials, Folder, PendingAuthorization, Release, ReleaseId } from '~/types'

export const DISCOGS_API_URL = 'https://api.discogs.com'
export const DISCOGS_WEB_URL = 'https://www.discogs.com'

const PAGE_SIZE = 100

export interface ConsumerKeys {
  consumerKey: string
  consumerSecret: string
}

export interface AuthenticateInput extends ConsumerKeys {
  token: string
  tokenSecret: string
}

export interface FetchListOptions {
  refresh?: boolean   // Bypass the response cache
}

/**
 * Operations the export workflow consumes
 */
export interface CollectionClient {
  authenticate(input: Partial<AuthenticateInput>): Promise<Credentials>
  beginAuthorization(keys: Partial<ConsumerKeys>, callbackUrl: string): Promise<PendingAuthorization>
  completeAuthorization(pending: PendingAuthorization, verifier: string): Promise<Credentials>
  getFolders(credentials: Credentials, options?: FetchListOptions): Promise<Folder[]>
  getReleasesByFolder(credentials: Credentials, folderId: number, options?: FetchListOptions): Promise<Release[]>
  forgetUser(username: string): void
}

export interface DiscogsClientConfig {
  userAgent: string
  timeout: number           // Milliseconds per request
  responseTtl: number       // Seconds; 0 disables response caching
  baseUrl?: string
  fetch?: typeof globalThis.fetch
  cache?: CacheManager
  rateLimiter?: RateLimiter
}

interface SigningMaterial {
  consumerKey: string
  consumerSecret: string
  token?: string
  tokenSecret?: string
  extra?: Record<string, string>
}

type Failure = 'auth' | 'api'

/**
 * Percent-encoding as OAuth requires (RFC 3986 unreserved set)
 */
export function oauthEncode(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
}

/**
 * Build a PLAINTEXT-signed OAuth Authorization header
 */
export function buildOAuthHeader(material: SigningMaterial, now: number = Date.now()): string {
  const params: Record<string, string> = {
    oauth_consumer_key: material.consumerKey,
    oauth_nonce: randomBytes(16).toString('hex'),
    oauth_signature_method: 'PLAINTEXT',
    oauth_timestamp: String(Math.floor(now / 1000)),
    oauth_version: '1.0',
    ...(material.token ? { oauth_token: material.token } : {}),
    ...material.extra
  }

  const signature = `${oauthEncode(material.consumerSecret)}&${oauthEncode(material.tokenSecret ?? '')}`

  const pairs = Object.entries(params).map(([key, value]) => `${key}="${oauthEncode(value)}"`)
  pairs.push(`oauth_signature="${signature}"`)
  return `OAuth ${pairs.join(', ')}`
}

/**
 * Strip the numeric suffix Discogs adds to tell same-named artists apart
 */
export function cleanArtistName(name: string): string {
  return name.replace(/\s+\(\d+\)$/, '').trim()
}

/**
 * Combine artist credits into one display name using their join phrases
 */
export function combineArtists(credits: Record<string, unknown>[]): string | null {
  const names = credits
    .map(credit => ({ name: cleanArtistName(readString(credit, 'name') ?? ''), join: (readString(credit, 'join') ?? '').trim() }))
    .filter(credit => credit.name !== '')

  if (names.length === 0) return null

  return names.map((credit, index) => {
    if (index === names.length - 1) return credit.name
    if (credit.join === '' || credit.join === ',') return `${credit.name}, `
    return `${credit.name} ${credit.join} `
  }).join('')
}

export function releaseUrl(releaseId: ReleaseId): string {
  return `${DISCOGS_WEB_URL}/release/${releaseId}`
}

function firstName(source: Record<string, unknown>, key: string): string | null {
  const [first] = readRecords(source, key)
  const name = first ? readString(first, 'name') : null
  return name ? cleanArtistName(name) : null
}

/**
 * Map a validated release record (a folder item's basic information or a
 * full release) to a Release
 */
export function toRelease(info: Record<string, unknown>, id: ReleaseId, dateAdded: string | null): Release {
  const year = readNumber(info, 'year')
  return {
    id,
    artist: combineArtists(readRecords(info, 'artists')),
    title: readString(info, 'title'),
    year: year !== null && year > 0 ? year : 0,
    url: releaseUrl(id),
    dateAdded,
    format: firstName(info, 'formats'),
    label: firstName(info, 'labels')
  }
}

export class DiscogsClient implements CollectionClient {
  private http: $Fetch
  private rateLimiter: RateLimiter
  private logger = useLogger('discogs')

  constructor(private config: DiscogsClientConfig) {
    this.http = createFetch({
      fetch: config.fetch,
      defaults: {
        baseURL: config.baseUrl ?? DISCOGS_API_URL,
        timeout: config.timeout,
        retry: 0
      }
    })
    this.rateLimiter = config.rateLimiter ?? createDiscogsRateLimiter()
  }

  /**
   * Verify an access token and resolve the user it belongs to
   */
  async authenticate(input: Partial<AuthenticateInput>): Promise<Credentials> {
    const { consumerKey, consumerSecret, token, tokenSecret } = input
    if (!consumerKey || !consumerSecret) {
      throw new AuthError('Consumer key and secret are required', 'missing_consumer_keys')
    }
    if (!token || !tokenSecret) {
      throw new AuthError('An OAuth access token and secret are required', 'missing_access_token')
    }

    const payload = await this.request('/oauth/identity', { consumerKey, consumerSecret, token, tokenSecret }, 'auth')
    const identity = this.deserialize(payload, DiscogsSchemas.identity, '/oauth/identity', 'auth')
    const username = readString(identity, 'username') ?? ''

    this.logger.info(`Authenticated Discogs user ${username}`)
    return { consumerKey, consumerSecret, token, tokenSecret, username }
  }

  /**
   * Obtain a request token and the URL where the user grants access
   */
  async beginAuthorization(keys: Partial<ConsumerKeys>, callbackUrl: string): Promise<PendingAuthorization> {
    const { consumerKey, consumerSecret } = keys
    if (!consumerKey || !consumerSecret) {
      throw new AuthError('Consumer key and secret are required', 'missing_consumer_keys')
    }

    const body = await this.requestToken('/oauth/request_token', {
      consumerKey,
      consumerSecret,
      extra: { oauth_callback: callbackUrl }
    })

    return {
      consumerKey,
      consumerSecret,
      requestToken: body.token,
      requestTokenSecret: body.tokenSecret,
      authorizeUrl: `${DISCOGS_WEB_URL}/oauth/authorize?oauth_token=${oauthEncode(body.token)}`
    }
  }

  /**
   * Exchange the verifier from the callback for an access token
   */
  async completeAuthorization(pending: PendingAuthorization, verifier: string): Promise<Credentials> {
    if (!verifier) {
      throw new AuthError('Missing OAuth verifier', 'missing_verifier')
    }

    const body = await this.requestToken('/oauth/access_token', {
      consumerKey: pending.consumerKey,
      consumerSecret: pending.consumerSecret,
      token: pending.requestToken,
      tokenSecret: pending.requestTokenSecret,
      extra: { oauth_verifier: verifier }
    })

    return this.authenticate({
      consumerKey: pending.consumerKey,
      consumerSecret: pending.consumerSecret,
      token: body.token,
      tokenSecret: body.tokenSecret
    })
  }

  async getFolders(credentials: Credentials, options: FetchListOptions = {}): Promise<Folder[]> {
    return this.cached(CacheKeys.folders(credentials.username), credentials, options, async () => {
      const endpoint = `/users/${encodeURIComponent(credentials.username)}/collection/folders`
      const payload = await this.request(endpoint, credentials)
      const body = this.deserialize(payload, DiscogsSchemas.folderList, endpoint)

      return readRecords(body, 'folders').map(folder => ({
        id: readNumber(folder, 'id') ?? 0,
        name: readString(folder, 'name') ?? '',
        count: readNumber(folder, 'count') ?? 0
      }))
    })
  }

  /**
   * Every release in a folder, across all result pages
   */
  async getReleasesByFolder(credentials: Credentials, folderId: number, options: FetchListOptions = {}): Promise<Release[]> {
    if (!Number.isInteger(folderId) || folderId < 0) {
      throw new ApiError(`Invalid folder id: ${folderId}`, 400)
    }

    return this.cached(CacheKeys.folderReleases(credentials.username, folderId), credentials, options, async () => {
      const endpoint = `/users/${encodeURIComponent(credentials.username)}/collection/folders/${folderId}/releases`
      const releases: Release[] = []
      let page = 1
      let pages = 1

      do {
        const payload = await this.request(`${endpoint}?page=${page}&per_page=${PAGE_SIZE}`, credentials)
        const body = this.deserialize(payload, DiscogsPayloadSchemas.folderReleasesPage, endpoint)
        const pagination = isRecord(body.pagination) ? body.pagination : {}
        pages = readNumber(pagination, 'pages') ?? 1

        for (const item of readRecords(body, 'releases')) {
          const info = isRecord(item.basic_information) ? item.basic_information : {}
          releases.push(toRelease(info, readNumber(item, 'id') ?? 0, readString(item, 'date_added')))
        }
        page++
      } while (page <= pages)

      this.logger.debug(`Fetched ${releases.length} releases from folder ${folderId} in ${pages} page(s)`)
      return releases
    })
  }

  /**
   * Drop every cached response fetched for `username`
   */
  forgetUser(username: string): void {
    const dropped = this.config.cache?.invalidateByTags([CacheKeys.userTag(username)]) ?? 0
    this.logger.debug(`Dropped ${dropped} cached response(s) for ${username}`)
  }

  private async cached<T>(
    key: string,
    credentials: Credentials,
    options: FetchListOptions,
    load: () => Promise<T>
  ): Promise<T> {
    const cache = this.config.cache
    if (!cache || this.config.responseTtl <= 0) return load()

    if (options.refresh) {
      cache.delete(key)
    }

    return cache.getOrSet(key, load, {
      ttl: this.config.responseTtl,
      tags: [CacheKeys.userTag(credentials.username)]
    })
  }

  /**
   * Signed GET returning parsed JSON
   */
  private async request(endpoint: string, material: SigningMaterial, failure: Failure = 'api'): Promise<unknown> {
    await this.rateLimiter.waitForSlot(material.consumerKey)

    try {
      return await this.http<unknown>(endpoint, {
        headers: {
          'Authorization': buildOAuthHeader(material),
          'User-Agent': this.config.userAgent,
          'Accept': 'application/json'
        }
      })
    } catch (error) {
      throw this.classifyError(error, endpoint, failure)
    }
  }

  /**
   * Signed POST to a token endpoint; the response is form-encoded
   */
  private async requestToken(endpoint: string, material: SigningMaterial): Promise<{ token: string; tokenSecret: string }> {
    await this.rateLimiter.waitForSlot(material.consumerKey)

    let text: string
    try {
      text = await this.http(endpoint, {
        method: 'POST',
        responseType: 'text',
        headers: {
          'Authorization': buildOAuthHeader(material),
          'User-Agent': this.config.userAgent,
          'Content-Type': 'application/x-www-form-urlencoded'
        }
      })
    } catch (error) {
      throw this.classifyError(error, endpoint, 'auth')
    }

    const params = new URLSearchParams(text)
    const token = params.get('oauth_token')
    const tokenSecret = params.get('oauth_token_secret')
    if (!token || !tokenSecret) {
      throw new AuthError(`Unexpected response from ${endpoint}`, 'malformed_token_response')
    }
    return { token, tokenSecret }
  }

  /**
   * Reject payloads whose shape does not match the schema
   */
  private deserialize(
    payload: unknown,
    schema: ValidationSchema,
    endpoint: string,
    failure: Failure = 'api'
  ): Record<string, unknown> {
    const result = useValidator().validate(payload, schema)

    if (!result.valid || !isRecord(payload)) {
      const issues = result.errors.slice(0, 3).map(issue => `${issue.field || '(root)'}: ${issue.message}`).join('; ')
      const message = `Unexpected response shape from ${endpoint}: ${issues}`
      throw failure === 'auth' ? new AuthError(message, 'malformed_identity') : new ApiError(message, undefined, endpoint)
    }

    return payload
  }

  private classifyError(error: unknown, endpoint: string, failure: Failure): AppError {
    if (error instanceof AppError) return error

    const status = error instanceof FetchError ? error.status ?? error.response?.status : undefined
    const reason = error instanceof Error ? error.message : String(error)

    if (status === 401 || status === 403) {
      return new AuthError(`Discogs rejected the credentials for ${endpoint}`, `http_${status}`, error)
    }

    if (status === 429) {
      const retryAfter = Number.parseInt(
        (error instanceof FetchError && error.response?.headers.get('retry-after')) || '60',
        10
      )
      return new RateLimitError(`Discogs rate limit reached on ${endpoint}`, retryAfter)
    }

    if (failure === 'auth') {
      return new AuthError(`Discogs authentication request failed: ${reason}`, status ? `http_${status}` : 'unreachable', error)
    }

    return new ApiError(`Discogs request to ${endpoint} failed: ${reason}`, status, endpoint, error)
  }
}

export function createDiscogsClient(config: DiscogsClientConfig): DiscogsClient {
  return new DiscogsClient(config)
}
