/**
 * Per-provider token bucket rate limiter with retry bookkeeping.
 *
 * Buckets refill lazily on every read. The limiter never throws on
 * exhaustion: callers poll `checkLimit` or await `waitIfNeeded`.
 */
import { silentLogger, type Logger } from '@crewroom/utils'
import { sleep } from '../async-utils.js'

export interface ProviderRateLimit {
  /** Requests allowed per window (bucket capacity) */
  limit: number
  /** Window length in seconds */
  window: number
}

export interface RetryPolicy {
  enabled: boolean
  maxRetries: number
  backoffMultiplier: number
}

export interface RateLimiterConfig {
  /** Merged over the defaults, per provider id */
  limits?: Record<string, ProviderRateLimit>
  retry?: Partial<RetryPolicy>
  /** Clock in epoch milliseconds */
  now?: () => number
  /** Used by waitIfNeeded */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  logger?: Logger
}

export interface RateLimitStats {
  availableTokens: number
  capacity: number
  /** Seconds until one request is affordable */
  waitTime: number
  retryCount: number
}

/** Reported for providers without a bucket */
export const UNLIMITED_TOKENS = 999999

const BASE_BACKOFF_SECONDS = 1

export const DEFAULT_PROVIDER_LIMITS: Readonly<Record<string, ProviderRateLimit>> = {
  gemini: { limit: 100, window: 60 },
  anthropic: { limit: 50, window: 60 },
  openai: { limit: 60, window: 60 },
  // local
  ollama: { limit: 1000, window: 60 },
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  enabled: true,
  maxRetries: 3,
  backoffMultiplier: 2,
}

export class TokenBucket {
  readonly capacity: number
  /** Tokens added per second */
  readonly refillRate: number
  private tokens: number
  private lastRefill: number

  constructor(
    capacity: number,
    refillRate: number,
    private readonly now: () => number = Date.now
  ) {
    this.capacity = capacity
    this.refillRate = refillRate
    this.tokens = capacity
    this.lastRefill = this.now()
  }

  private refill(): void {
    const now = this.now()
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate)
    this.lastRefill = now
  }

  /**
   * Take `cost` tokens if affordable
   */
  consume(cost = 1): boolean {
    this.refill()
    if (this.tokens >= cost) {
      this.tokens -= cost
      return true
    }
    return false
  }

  /**
   * Seconds until `cost` tokens are available; 0 if affordable now
   */
  getWaitTime(cost = 1): number {
    this.refill()
    if (this.tokens >= cost) {
      return 0
    }
    return (cost - this.tokens) / this.refillRate
  }

  getAvailableTokens(): number {
    this.refill()
    return Math.floor(this.tokens)
  }
}

export class RateLimiter {
  private buckets = new Map<string, TokenBucket>()
  private retryCounts = new Map<string, number>()
  private retry: RetryPolicy
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private logger: Logger

  constructor(config: RateLimiterConfig = {}) {
    const now = config.now ?? Date.now
    this.retry = { ...DEFAULT_RETRY_POLICY, ...config.retry }
    this.sleep = config.sleep ?? sleep
    this.logger = config.logger ?? silentLogger

    const limits = { ...DEFAULT_PROVIDER_LIMITS, ...config.limits }
    for (const [provider, { limit, window }] of Object.entries(limits)) {
      this.buckets.set(provider, new TokenBucket(limit, limit / window, now))
    }
  }

  /**
   * Consume `cost` tokens for a provider. Unknown providers are always allowed.
   */
  checkLimit(provider: string, cost = 1): boolean {
    const bucket = this.buckets.get(provider)
    if (!bucket) {
      return true
    }
    const allowed = bucket.consume(cost)
    if (!allowed) {
      this.logger.debug(`Rate limit reached for ${provider}`)
    }
    return allowed
  }

  getWaitTime(provider: string, cost = 1): number {
    return this.buckets.get(provider)?.getWaitTime(cost) ?? 0
  }

  getAvailableTokens(provider: string): number {
    return this.buckets.get(provider)?.getAvailableTokens() ?? UNLIMITED_TOKENS
  }

  /**
   * Sleep until `cost` tokens are affordable. Does not consume, so a
   * concurrent caller may still take them first: pair with `checkLimit`.
   */
  async waitIfNeeded(provider: string, cost = 1, signal?: AbortSignal): Promise<void> {
    const waitSeconds = this.getWaitTime(provider, cost)
    if (waitSeconds > 0) {
      this.logger.info(`Rate limited on ${provider}, waiting ${waitSeconds.toFixed(1)}s`)
      await this.sleep(waitSeconds * 1000, signal)
    }
  }

  resetRetryCount(provider: string): void {
    this.retryCounts.set(provider, 0)
  }

  incrementRetryCount(provider: string): number {
    const next = this.getRetryCount(provider) + 1
    this.retryCounts.set(provider, next)
    return next
  }

  getRetryCount(provider: string): number {
    return this.retryCounts.get(provider) ?? 0
  }

  shouldRetry(provider: string): boolean {
    if (!this.retry.enabled) {
      return false
    }
    return this.getRetryCount(provider) < this.retry.maxRetries
  }

  /**
   * Seconds to wait before the next retry: 1 * multiplier ^ retryCount
   */
  getBackoffTime(provider: string): number {
    return BASE_BACKOFF_SECONDS * this.retry.backoffMultiplier ** this.getRetryCount(provider)
  }

  getStats(provider: string): RateLimitStats {
    const bucket = this.buckets.get(provider)
    if (!bucket) {
      return {
        availableTokens: UNLIMITED_TOKENS,
        capacity: UNLIMITED_TOKENS,
        waitTime: 0,
        retryCount: 0,
      }
    }

    return {
      availableTokens: bucket.getAvailableTokens(),
      capacity: bucket.capacity,
      waitTime: bucket.getWaitTime(1),
      retryCount: this.getRetryCount(provider),
    }
  }
}
