/**
 * In-process fan-out and rate limiting.
 *
 * ConcurrencyLimiter bounds how many tasks run at once (competitors, pages).
 * ExtractionRateLimiter is shared by every extraction-service call in a run:
 * at most `maxInFlight` calls in flight and at least `minSpacingMs` between
 * two call starts.
 */

import type { RateLimitConfig } from './types.js'

export class ConcurrencyLimiter {
  private running = 0
  private readonly queue: Array<() => void> = []

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`)
    }
  }

  /**
   * Execute a function once a slot is free.
   * Rejects with the signal's reason, without running `fn`, if the signal
   * aborts while the task is queued.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire()
    try {
      signal?.throwIfAborted()
      return await fn()
    } finally {
      this.release()
    }
  }

  private async acquire(): Promise<void> {
    if (this.running < this.maxConcurrent) {
      this.running++
      return
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve)
    })
  }

  private release(): void {
    const next = this.queue.shift()
    if (next) {
      // Slot passes straight to the next waiter
      next()
    } else {
      this.running--
    }
  }

  getRunning(): number {
    return this.running
  }

  getQueueLength(): number {
    return this.queue.length
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class ExtractionRateLimiter {
  private readonly slots: ConcurrencyLimiter
  private readonly minSpacingMs: number
  private nextStartAt = 0
  private started = 0

  constructor(config: RateLimitConfig) {
    this.slots = new ConcurrencyLimiter(config.maxInFlight)
    this.minSpacingMs = Math.max(0, config.minSpacingMs)
  }

  /**
   * Run one extraction-service call under the run-wide limits.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.slots.run(async () => {
      // Reserve the start time before yielding so concurrent callers queue behind it
      const now = Date.now()
      const startAt = Math.max(now, this.nextStartAt)
      this.nextStartAt = startAt + this.minSpacingMs

      if (startAt > now) {
        await sleep(startAt - now)
      }
      signal?.throwIfAborted()

      this.started++
      return fn()
    }, signal)
  }

  /** Calls started so far */
  getStartedCount(): number {
    return this.started
  }

  getInFlight(): number {
    return this.slots.getRunning()
  }
}
