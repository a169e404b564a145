import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { FrameClock, ManualTickSource, type Subscription } from "./clock.js"
import { ConfigError } from "./errors.js"
import type { Tick } from "./types.js"

describe("FrameClock", () => {
  let source: ManualTickSource
  let clock: FrameClock

  beforeEach(() => {
    source = new ManualTickSource()
    clock = new FrameClock({ intervalMs: 80, source })
  })

  describe("construction", () => {
    it("defaults to an 80ms interval", () => {
      expect(new FrameClock({ source }).intervalMs).toBe(80)
    })

    it("rejects non-positive intervals", () => {
      expect(() => new FrameClock({ intervalMs: 0 })).toThrow(ConfigError)
      expect(() => new FrameClock({ intervalMs: -5 })).toThrow(ConfigError)
      expect(() => new FrameClock({ intervalMs: Number.NaN })).toThrow(
        /Invalid intervalMs/,
      )
    })
  })

  describe("subscribe", () => {
    it("calls subscribers in registration order with the same tick", () => {
      const calls: string[] = []
      clock.subscribe(tick => calls.push(`a${tick.index}`))
      clock.subscribe(tick => calls.push(`b${tick.index}`))

      source.pulse(2)

      expect(calls).toEqual(["a0", "b0", "a1", "b1"])
    })

    it("derives elapsed time from the tick index", () => {
      const ticks: Tick[] = []
      clock.subscribe(tick => ticks.push(tick))

      source.pulse(3)

      expect(ticks).toEqual([
        { index: 0, elapsedMs: 0 },
        { index: 1, elapsedMs: 80 },
        { index: 2, elapsedMs: 160 },
      ])
    })

    it("runs the source only while someone is subscribed", () => {
      expect(source.isStarted()).toBe(false)

      const a = clock.subscribe(() => {})
      const b = clock.subscribe(() => {})
      expect(source.isStarted()).toBe(true)
      expect(clock.isRunning()).toBe(true)

      a.unsubscribe()
      expect(source.isStarted()).toBe(true)

      b.unsubscribe()
      expect(source.isStarted()).toBe(false)
      expect(clock.isRunning()).toBe(false)
    })

    it("gives every subscription its own id", () => {
      const a = clock.subscribe(() => {})
      const b = clock.subscribe(() => {})
      expect(a.id).not.toBe(b.id)
    })
  })

  describe("unsubscribe", () => {
    it("stops callbacks for that subscriber only", () => {
      const a = vi.fn()
      const b = vi.fn()
      const subscription = clock.subscribe(a)
      clock.subscribe(b)

      source.pulse()
      subscription.unsubscribe()
      source.pulse(2)

      expect(a).toHaveBeenCalledTimes(1)
      expect(b).toHaveBeenCalledTimes(3)
      expect(clock.subscriberCount).toBe(1)
    })

    it("is idempotent", () => {
      const subscription = clock.subscribe(() => {})
      clock.subscribe(() => {})

      subscription.unsubscribe()
      subscription.unsubscribe()

      expect(clock.subscriberCount).toBe(1)
    })

    it("skips a subscriber removed earlier in the same dispatch", () => {
      const late = vi.fn()
      let lateSubscription: Subscription | undefined
      clock.subscribe(() => lateSubscription?.unsubscribe())
      lateSubscription = clock.subscribe(late)

      source.pulse()

      expect(late).not.toHaveBeenCalled()
    })
  })

  it("delivers the next tick to subscribers added during a dispatch", () => {
    const added: number[] = []
    let subscribed = false
    clock.subscribe(() => {
      if (subscribed) return
      subscribed = true
      clock.subscribe(tick => added.push(tick.index))
    })

    source.pulse()
    expect(added).toEqual([])

    source.pulse()
    expect(added).toEqual([1])
  })

  describe("errors", () => {
    it("routes a subscriber's error to its own handler", () => {
      const onError = vi.fn()
      const sibling = vi.fn()
      const boom = new Error("boom")
      clock.subscribe(() => {
        throw boom
      }, onError)
      clock.subscribe(sibling)

      source.pulse()

      expect(onError).toHaveBeenCalledWith(boom)
      expect(sibling).toHaveBeenCalledTimes(1)
    })

    it("rethrows unhandled errors after every subscriber ran", () => {
      const sibling = vi.fn()
      clock.subscribe(() => {
        throw new Error("boom")
      })
      clock.subscribe(sibling)

      expect(() => source.pulse()).toThrow("boom")
      expect(sibling).toHaveBeenCalledTimes(1)
    })

    it("aggregates several unhandled errors", () => {
      clock.subscribe(() => {
        throw new Error("first")
      })
      clock.subscribe(() => {
        throw new Error("second")
      })

      expect(() => source.pulse()).toThrow(AggregateError)
    })

    it("hands unhandled errors to the clock's handler instead", () => {
      const onError = vi.fn()
      const handled = new FrameClock({ source, onError })
      const sibling = vi.fn()
      const boom = new Error("boom")
      handled.subscribe(() => {
        throw boom
      })
      handled.subscribe(sibling)

      expect(() => source.pulse()).not.toThrow()
      expect(onError).toHaveBeenCalledWith(boom)
      expect(sibling).toHaveBeenCalledTimes(1)
    })
  })

  describe("current", () => {
    it("is tick 0 before any dispatch", () => {
      expect(clock.current()).toEqual({ index: 0, elapsedMs: 0 })
    })

    it("is the most recent tick", () => {
      clock.subscribe(() => {})
      source.pulse(3)
      expect(clock.current()).toEqual({ index: 2, elapsedMs: 160 })
    })
  })

  it("ignores manual pulses while nobody is subscribed", () => {
    source.pulse(5)
    expect(clock.current()).toEqual({ index: 0, elapsedMs: 0 })
  })
})

describe("IntervalTickSource", () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("ticks once per interval while subscribed", () => {
    const clock = new FrameClock({ intervalMs: 100 })
    const callback = vi.fn()
    const subscription = clock.subscribe(callback)

    vi.advanceTimersByTime(350)
    expect(callback).toHaveBeenCalledTimes(3)

    subscription.unsubscribe()
    vi.advanceTimersByTime(1000)
    expect(callback).toHaveBeenCalledTimes(3)
  })
})
