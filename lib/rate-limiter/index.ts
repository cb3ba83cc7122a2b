/**
 * Rate Limiter Utility Library
 *
 * Sliding-window limiter for outbound calls to the collection API. Discogs
 * allows 60 authenticated requests per minute per user; callers wait for a
 * free slot instead of being rejected, unless the wait would exceed
 * `maxWait`, in which case a RateLimitError is thrown.
 */

import { RateLimitError } from '~/lib/error-utils'

export interface RateLimitConfig {
  requests: number        // Requests allowed per window
  window: number          // Window length in seconds
  burstLimit: number      // Requests allowed within any single second
  maxWait: number         // Longest acceptable wait in milliseconds
}

type Sleep = (ms: number) => Promise<void>

const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms))

export class RateLimiter {
  private requests = new Map<string, number[]>()

  constructor(
    private config: RateLimitConfig,
    private now: () => number = Date.now,
    private sleep: Sleep = defaultSleep
  ) {}

  /**
   * Resolve once a request for `key` may be sent, recording it
   */
  async waitForSlot(key: string): Promise<void> {
    let waited = 0

    for (;;) {
      const delay = this.delayFor(key)
      if (delay === 0) {
        this.history(key).push(this.now())
        return
      }

      if (waited + delay > this.config.maxWait) {
        throw new RateLimitError(
          `Rate limit of ${this.config.requests} requests per ${this.config.window}s reached`,
          Math.ceil(delay / 1000)
        )
      }

      await this.sleep(delay)
      waited += delay
    }
  }

  /**
   * Milliseconds until the next request for `key` may go out
   */
  private delayFor(key: string): number {
    const now = this.now()
    const history = this.prune(key)

    if (history.length >= this.config.requests) {
      const oldest = history[history.length - this.config.requests]
      return Math.max(1, oldest + this.config.window * 1000 - now)
    }

    const lastSecond = history.filter(time => time > now - 1000)
    if (lastSecond.length >= this.config.burstLimit) {
      const oldestInSecond = lastSecond[lastSecond.length - this.config.burstLimit]
      return Math.max(1, oldestInSecond + 1000 - now)
    }

    return 0
  }

  private prune(key: string): number[] {
    const windowStart = this.now() - this.config.window * 1000
    const history = this.history(key).filter(time => time > windowStart)
    this.requests.set(key, history)
    return history
  }

  private history(key: string): number[] {
    let history = this.requests.get(key)
    if (!history) {
      history = []
      this.requests.set(key, history)
    }
    return history
  }
}

export function createDiscogsRateLimiter(overrides: Partial<RateLimitConfig> = {}): RateLimiter {
  return new RateLimiter({
    requests: 60,
    window: 60,
    burstLimit: 10,
    maxWait: 30000,
    ...overrides
  })
}
