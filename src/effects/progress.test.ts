import { describe, expect, it } from "vitest"
import { ConfigError } from "../errors.js"
import type { Tick } from "../types.js"
import { ProgressBar } from "./progress.js"

const tick = (index: number): Tick => ({ index, elapsedMs: index * 80 })

describe("ProgressBar", () => {
  it("fills in proportion to the value", () => {
    const bar = new ProgressBar({ total: 4, width: 8 })
    bar.update(1)

    expect(bar.advance(tick(0))).toEqual({
      text: "[██░░░░░░] 25.0% (1/4)",
      attributes: undefined,
      directive: "overwrite",
    })
  })

  it("clamps updates to the range", () => {
    const bar = new ProgressBar({ total: 4 })

    bar.update(99)
    expect(bar.current).toBe(4)
    expect(bar.isComplete()).toBe(true)

    bar.update(-3)
    expect(bar.current).toBe(0)

    bar.increment()
    bar.increment(2)
    expect(bar.current).toBe(3)
  })

  it("uses the chosen fill style", () => {
    const bar = new ProgressBar({ total: 4, width: 4, style: "dots" })
    bar.update(2)

    expect(bar.advance(tick(0)).text).toBe("[●●○○] 50.0% (2/4)")
  })

  it("estimates the remaining time from the clock", () => {
    const bar = new ProgressBar({ total: 10, width: 10, showEta: true })

    expect(bar.advance(tick(0)).text).toBe("[░░░░░░░░░░] 0.0% (0/10)")

    bar.update(2)
    expect(bar.advance(tick(5)).text).toBe(
      "[██░░░░░░░░] 20.0% (2/10) ETA: 1.6s",
    )
  })

  it("colors only the bar", () => {
    const bar = new ProgressBar({ label: "cp", width: 3, color: "cyan" })
    const style = { color: "cyan" }

    expect(bar.advance(tick(0)).attributes).toEqual([
      undefined,
      undefined,
      undefined,
      style,
      style,
      style,
      style,
      style,
    ])
  })

  it("starts over after reset", () => {
    const bar = new ProgressBar({ total: 10 })
    bar.update(7)

    bar.reset()

    expect(bar.current).toBe(0)
    expect(bar.counter()).toBe("(0/10)")
  })

  it("rejects invalid options before drawing", () => {
    expect(() => new ProgressBar({ total: 0 })).toThrow(ConfigError)
    expect(() => new ProgressBar({ width: 1.5 })).toThrow(/Invalid width/)
    expect(() => new ProgressBar().update(Number.NaN)).toThrow(
      /Invalid value/,
    )
  })
})
