import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  DEFAULT_PROVIDER_LIMITS,
  RateLimiter,
  TokenBucket,
  UNLIMITED_TOKENS,
} from './rate-limiter.js'
import { CrewroomError } from '@crewroom/types'

describe('TokenBucket', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(0)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('starts full and consumes exactly the requested cost', () => {
    const bucket = new TokenBucket(10, 1)

    expect(bucket.getAvailableTokens()).toBe(10)
    expect(bucket.consume(3)).toBe(true)
    expect(bucket.getAvailableTokens()).toBe(7)
    expect(bucket.consume()).toBe(true)
    expect(bucket.getAvailableTokens()).toBe(6)
  })

  it('refuses consumption it cannot afford without changing the balance', () => {
    const bucket = new TokenBucket(2, 1)

    expect(bucket.consume(3)).toBe(false)
    expect(bucket.getAvailableTokens()).toBe(2)
  })

  it('refills lazily and never exceeds capacity', () => {
    const bucket = new TokenBucket(2, 1)
    bucket.consume(2)

    vi.setSystemTime(1_000)
    expect(bucket.getAvailableTokens()).toBe(1)

    vi.setSystemTime(60_000)
    expect(bucket.getAvailableTokens()).toBe(2)
  })

  it('reports the wait time for the missing tokens', () => {
    const bucket = new TokenBucket(2, 2)
    bucket.consume(2)

    expect(bucket.getWaitTime(1)).toBe(0.5)
    vi.setSystemTime(250)
    expect(bucket.getWaitTime(1)).toBe(0.25)
    vi.setSystemTime(500)
    expect(bucket.getWaitTime(1)).toBe(0)
  })
})

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(0)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('uses the default per-provider limits', () => {
    const limiter = new RateLimiter()

    expect(limiter.getStats('gemini').capacity).toBe(100)
    expect(limiter.getStats('anthropic').capacity).toBe(50)
    expect(limiter.getStats('openai').capacity).toBe(60)
    expect(limiter.getStats('ollama').capacity).toBe(1000)
    expect(DEFAULT_PROVIDER_LIMITS.openai).toEqual({ limit: 60, window: 60 })
  })

  it('enforces configured limits', () => {
    const limiter = new RateLimiter({ limits: { openai: { limit: 2, window: 60 } } })

    expect(limiter.checkLimit('openai')).toBe(true)
    expect(limiter.checkLimit('openai')).toBe(true)
    expect(limiter.checkLimit('openai')).toBe(false)
    expect(limiter.getWaitTime('openai')).toBeCloseTo(30)

    vi.setSystemTime(31_000)
    expect(limiter.checkLimit('openai')).toBe(true)
  })

  it('keeps the defaults for providers that are not overridden', () => {
    const limiter = new RateLimiter({ limits: { openai: { limit: 2, window: 60 } } })
    expect(limiter.getStats('anthropic').capacity).toBe(50)
  })

  it('fails open for unknown providers', () => {
    const limiter = new RateLimiter({ limits: { openai: { limit: 1, window: 60 } } })

    for (let i = 0; i < 5; i++) {
      expect(limiter.checkLimit('mystery')).toBe(true)
    }
    expect(limiter.getWaitTime('mystery')).toBe(0)
    expect(limiter.getAvailableTokens('mystery')).toBe(UNLIMITED_TOKENS)
    expect(limiter.getStats('mystery')).toEqual({
      availableTokens: UNLIMITED_TOKENS,
      capacity: UNLIMITED_TOKENS,
      waitTime: 0,
      retryCount: 0,
    })
  })

  it('waits until a token is affordable without consuming it', async () => {
    const limiter = new RateLimiter({ limits: { openai: { limit: 1, window: 2 } } })
    limiter.checkLimit('openai')

    let done = false
    const waiting = limiter.waitIfNeeded('openai').then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(1_999)
    expect(done).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    await waiting
    expect(done).toBe(true)
    expect(limiter.getAvailableTokens('openai')).toBe(1)
  })

  it('returns immediately when nothing needs waiting', async () => {
    const limiter = new RateLimiter()
    await expect(limiter.waitIfNeeded('openai')).resolves.toBeUndefined()
  })

  it('aborts a wait when the signal fires', async () => {
    const limiter = new RateLimiter({ limits: { openai: { limit: 1, window: 60 } } })
    limiter.checkLimit('openai')
    const controller = new AbortController()

    const waiting = limiter.waitIfNeeded('openai', 1, controller.signal)
    controller.abort()

    await expect(waiting).rejects.toBeInstanceOf(CrewroomError)
  })

  it('computes exponential backoff from the retry count', () => {
    const limiter = new RateLimiter({ retry: { backoffMultiplier: 2 } })

    expect(limiter.getBackoffTime('openai')).toBe(1)
    limiter.incrementRetryCount('openai')
    expect(limiter.getBackoffTime('openai')).toBe(2)
    limiter.incrementRetryCount('openai')
    expect(limiter.getBackoffTime('openai')).toBe(4)
  })

  it('tracks retries per provider until the maximum', () => {
    const limiter = new RateLimiter({ retry: { maxRetries: 2 } })

    expect(limiter.shouldRetry('openai')).toBe(true)
    expect(limiter.incrementRetryCount('openai')).toBe(1)
    expect(limiter.incrementRetryCount('openai')).toBe(2)
    expect(limiter.shouldRetry('openai')).toBe(false)
    expect(limiter.getRetryCount('anthropic')).toBe(0)
    expect(limiter.getStats('openai').retryCount).toBe(2)

    limiter.resetRetryCount('openai')
    expect(limiter.getRetryCount('openai')).toBe(0)
    expect(limiter.shouldRetry('openai')).toBe(true)
  })

  it('never retries when retries are disabled', () => {
    const limiter = new RateLimiter({ retry: { enabled: false } })
    expect(limiter.shouldRetry('openai')).toBe(false)
  })

  it('accepts an injected clock', () => {
    let now = 0
    const limiter = new RateLimiter({
      limits: { local: { limit: 1, window: 10 } },
      now: () => now,
    })

    expect(limiter.checkLimit('local')).toBe(true)
    expect(limiter.checkLimit('local')).toBe(false)
    now = 10_000
    expect(limiter.checkLimit('local')).toBe(true)
  })
})
