import { ConfigError } from "./errors.js"
import type { Tick } from "./types.js"

/**
 * Default tick interval in milliseconds
 */
export const DEFAULT_INTERVAL_MS = 80

/**
 * Drives the clock. Calls `pulse` once per interval while started.
 */
export interface TickSource {
  start(pulse: () => void, intervalMs: number): void
  stop(): void
}

/**
 * Tick source backed by setInterval
 */
export class IntervalTickSource implements TickSource {
  private interval: ReturnType<typeof setInterval> | null = null

  start(pulse: () => void, intervalMs: number): void {
    if (this.interval) return

    this.interval = setInterval(pulse, intervalMs)
    // An effect that is never stopped must not keep the process alive
    this.interval.unref?.()
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
  }
}

/**
 * Tick source pulsed by hand, for tests and for callers that own their
 * own render loop
 */
export class ManualTickSource implements TickSource {
  private onPulse: (() => void) | null = null

  start(pulse: () => void): void {
    this.onPulse = pulse
  }

  stop(): void {
    this.onPulse = null
  }

  /**
   * Emit `count` ticks. Ignored while the clock is not running.
   */
  pulse(count = 1): void {
    for (let i = 0; i < count; i++) {
      this.onPulse?.()
    }
  }

  isStarted(): boolean {
    return this.onPulse !== null
  }
}

export type TickCallback = (tick: Tick) => void

/**
 * Handle returned by FrameClock.subscribe
 */
export interface Subscription {
  readonly id: number
  unsubscribe(): void
}

interface Subscriber {
  callback: TickCallback
  onError?: (error: unknown) => void
}

export interface FrameClockOptions {
  /** Tick interval in milliseconds (default: 80) */
  intervalMs?: number
  /** Where ticks come from (default: setInterval) */
  source?: TickSource
  /**
   * Receives errors of subscribers that have no handler of their own.
   * Without it they are thrown from the tick source's callback.
   */
  onError?: (error: unknown) => void
}

/**
 * Shared tick source for any number of effect runners.
 *
 * Subscribers are called once per tick in registration order, all on the
 * same logical timeline. The underlying source only runs while someone is
 * subscribed.
 */
export class FrameClock {
  readonly intervalMs: number
  private source: TickSource
  private onError?: (error: unknown) => void
  private subscribers: Map<number, Subscriber> = new Map()
  private nextId = 1
  private tickCount = 0
  private running = false

  constructor(options: FrameClockOptions = {}) {
    const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new ConfigError(
        "intervalMs",
        `expected a positive number of milliseconds, got ${intervalMs}`,
      )
    }
    this.intervalMs = intervalMs
    this.source = options.source ?? new IntervalTickSource()
    this.onError = options.onError
  }

  /**
   * Register a callback invoked on every tick
   * @param onError - Receives errors thrown by this callback only
   */
  subscribe(
    callback: TickCallback,
    onError?: (error: unknown) => void,
  ): Subscription {
    const id = this.nextId++
    this.subscribers.set(id, { callback, onError })

    if (!this.running) {
      this.running = true
      this.source.start(() => this.dispatch(), this.intervalMs)
    }

    let active = true
    return {
      id,
      unsubscribe: () => {
        if (!active) return
        active = false
        this.subscribers.delete(id)

        if (this.subscribers.size === 0 && this.running) {
          this.running = false
          this.source.stop()
        }
      },
    }
  }

  /**
   * The most recent tick (index 0 before the first dispatch)
   */
  current(): Tick {
    const index = Math.max(this.tickCount - 1, 0)
    return { index, elapsedMs: index * this.intervalMs }
  }

  get subscriberCount(): number {
    return this.subscribers.size
  }

  isRunning(): boolean {
    return this.running
  }

  private dispatch(): void {
    const index = this.tickCount++
    const tick: Tick = { index, elapsedMs: index * this.intervalMs }

    // Snapshot so that subscribers added during dispatch wait for the next tick
    const ids = [...this.subscribers.keys()]
    const unhandled: unknown[] = []

    for (const id of ids) {
      const subscriber = this.subscribers.get(id)
      // Unsubscribed earlier in this dispatch
      if (!subscriber) continue

      try {
        subscriber.callback(tick)
      } catch (error) {
        if (subscriber.onError) {
          subscriber.onError(error)
        } else {
          unhandled.push(error)
        }
      }
    }

    if (unhandled.length === 0) return

    const error =
      unhandled.length === 1
        ? unhandled[0]
        : new AggregateError(unhandled, "Multiple tick subscribers failed")
    if (!this.onError) throw error
    this.onError(error)
  }
}
