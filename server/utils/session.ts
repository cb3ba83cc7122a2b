/**
 * Cookie-bound export sessions
 *
 * Each browser gets an opaque id in a cookie; the ExportSession it points
 * to lives in a CacheManager with sliding expiry, so an idle session
 * disappears after the configured TTL. A session is only stored once it
 * holds something (a sign-in or a pending authorization), and the cookie
 * is sent again on every request that uses it so browser and server expire
 * together.
 */

import { randomUUID } from 'node:crypto'
import type { H3Event } from 'h3'
import { getCookie, setCookie } from 'h3'
import { CacheKeys, type CacheManager } from '~/lib/cache-manager'
import { ExportSession, createExportSession } from '~/lib/export-session'

export const SESSION_COOKIE = 'qrl_session'

export interface SessionStoreOptions {
  ttl: number           // Seconds
  secure?: boolean      // Send the cookie over HTTPS only
}

/**
 * A session bound to one request, stored or not yet
 */
export interface ResolvedSession {
  id: string
  session: ExportSession
  stored: boolean
}

export class SessionStore {
  constructor(
    private cache: CacheManager,
    private options: SessionStoreOptions
  ) {}

  /**
   * The session of the requesting browser, or a fresh one that is not
   * stored until `commit` finds it started
   */
  resolve(event: H3Event): ResolvedSession {
    const id = getCookie(event, SESSION_COOKIE)
    const existing = id ? this.lookup(id) : null
    if (id && existing) {
      return { id, session: existing, stored: true }
    }

    return { id: randomUUID(), session: createExportSession(), stored: false }
  }

  /**
   * Store a newly started session, drop a cleared one, and refresh the
   * cookie of every session that stays
   */
  commit(event: H3Event, resolved: ResolvedSession): void {
    const key = CacheKeys.session(resolved.id)

    if (!resolved.session.isStarted) {
      if (resolved.stored) this.cache.delete(key)
      return
    }

    if (!resolved.stored) {
      this.cache.set(key, resolved.session, { ttl: this.options.ttl, sliding: true })
    }

    setCookie(event, SESSION_COOKIE, resolved.id, {
      httpOnly: true,
      sameSite: 'lax',
      path: '/',
      secure: this.options.secure ?? false,
      maxAge: this.options.ttl
    })
  }

  get size(): number {
    return this.cache.getStats().totalEntries
  }

  destroy(): void {
    this.cache.destroy()
  }

  private lookup(id: string): ExportSession | null {
    const value = this.cache.get<unknown>(CacheKeys.session(id))
    return value instanceof ExportSession ? value : null
  }
}

export function createSessionStore(cache: CacheManager, options: SessionStoreOptions): SessionStore {
  return new SessionStore(cache, options)
}
