import { describe, expect, it } from "vitest"
import { ConfigError } from "../errors.js"
import type { ColorName, FrameContent } from "../types.js"
import { brightnessAt, cycleLength, GlowText } from "./glow.js"

const tick = { index: 0, elapsedMs: 0 }

describe("GlowText", () => {
  describe("validation", () => {
    it("rejects an intensity above 10", () => {
      let caught: unknown
      try {
        new GlowText({ text: "hi", color: "cyan", intensity: 15 })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(ConfigError)
      expect(caught).toMatchObject({ option: "intensity" })
    })

    it("rejects intensities below 1 and fractions", () => {
      expect(
        () => new GlowText({ text: "hi", color: "cyan", intensity: 0 }),
      ).toThrow(ConfigError)
      expect(
        () => new GlowText({ text: "hi", color: "cyan", intensity: 2.5 }),
      ).toThrow(ConfigError)
    })

    it("rejects unknown colors", () => {
      const color = "purple" as unknown as ColorName
      expect(() => new GlowText({ text: "hi", color, intensity: 3 })).toThrow(
        /Invalid color/,
      )
    })
  })

  describe("cycleLength", () => {
    it("gets shorter as intensity grows", () => {
      expect(cycleLength(1)).toBe(22)
      expect(cycleLength(3)).toBe(18)
      expect(cycleLength(10)).toBe(4)
    })
  })

  describe("brightnessAt", () => {
    it("is dark at the start and brightest halfway", () => {
      expect(brightnessAt(0, 8)).toBe(0)
      expect(brightnessAt(4, 8)).toBe(1)
      expect(brightnessAt(2, 8)).toBeCloseTo(0.5)
    })
  })

  it("pulses through the gradient and wraps", () => {
    const glow = new GlowText({ text: "hello", color: "cyan", intensity: 10 })
    const frames: FrameContent[] = Array.from({ length: 5 }, () =>
      glow.advance(tick),
    )

    expect(frames.map(frame => frame.attributes)).toEqual([
      { color: { ansi256: 27 }, bold: false },
      { color: { ansi256: 39 }, bold: false },
      { color: { ansi256: 51 }, bold: true },
      { color: { ansi256: 39 }, bold: false },
      { color: { ansi256: 27 }, bold: false },
    ])
    expect(frames[0].text).toBe("  hello  ")
    expect(frames[0].directive).toBe("overwrite")
  })

  it("keeps the phase inside the cycle", () => {
    const glow = new GlowText({ text: "x", color: "red", intensity: 10 })
    for (let i = 0; i < 103; i++) glow.advance(tick)

    expect(glow.currentPhase()).toBe(103 % 4)
  })

  it("returns to the darkest level after reset", () => {
    const glow = new GlowText({ text: "x", color: "green", intensity: 5 })
    glow.advance(tick)
    glow.advance(tick)

    glow.reset()

    expect(glow.currentPhase()).toBe(0)
    expect(glow.advance(tick).attributes).toEqual({
      color: { ansi256: 22 },
      bold: false,
    })
  })
})
