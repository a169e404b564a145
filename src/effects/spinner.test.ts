import { describe, expect, it } from "vitest"
import { ConfigError } from "../errors.js"
import type { Tick } from "../types.js"
import { spinnerGlyphs } from "./presets.js"
import { Spinner } from "./spinner.js"
import { StepSequence } from "./step.js"

const tick = (index: number): Tick => ({ index, elapsedMs: index * 80 })

function texts(effect: Spinner | StepSequence, count: number): string[] {
  return Array.from({ length: count }, (_, i) => effect.advance(tick(i)).text)
}

describe("Spinner", () => {
  it("cycles through its glyphs and wraps around", () => {
    const spinner = new Spinner({
      label: "npm",
      message: "installing",
      glyphs: ["|", "/", "-", "\\"],
    })

    expect(texts(spinner, 5)).toEqual([
      "| npm: installing",
      "/ npm: installing",
      "- npm: installing",
      "\\ npm: installing",
      "| npm: installing",
    ])
  })

  it("overwrites the same line", () => {
    const spinner = new Spinner({ label: "a", message: "b" })
    expect(spinner.advance(tick(0)).directive).toBe("overwrite")
  })

  it("starts over after reset", () => {
    const spinner = new Spinner({
      label: "npm",
      message: "installing",
      glyphs: ["a", "b", "c"],
    })
    texts(spinner, 2)

    spinner.reset()

    expect(spinner.glyphIndex()).toBe(0)
    expect(spinner.advance(tick(2)).text).toBe("a npm: installing")
  })

  it("defaults to the dots preset", () => {
    const spinner = new Spinner({ label: "x", message: "y" })
    expect(spinner.advance(tick(0)).text).toBe(`${spinnerGlyphs("dots")[0]} x: y`)
    expect(spinnerGlyphs("dots")[0]).toBe("⠋")
  })

  it("rejects an empty glyph sequence", () => {
    expect(() => new Spinner({ label: "x", message: "y", glyphs: [] })).toThrow(
      ConfigError,
    )
  })

  it("colors the whole line when a color is given", () => {
    const spinner = new Spinner({ label: "x", message: "y", color: "cyan" })
    expect(spinner.advance(tick(0)).attributes).toEqual({ color: "cyan" })
  })

  it("rotates through extra messages", () => {
    const spinner = new Spinner({
      label: "yarn",
      message: "start",
      glyphs: ["*"],
      messages: ["a", "b"],
      rotateEvery: 2,
    })

    expect(texts(spinner, 6)).toEqual([
      "* yarn: start",
      "* yarn: a",
      "* yarn: a",
      "* yarn: b",
      "* yarn: b",
      "* yarn: a",
    ])

    spinner.reset()
    expect(spinner.advance(tick(6)).text).toBe("* yarn: start")
  })

  it("rejects a non-positive rotation period", () => {
    expect(
      () => new Spinner({ label: "x", message: "y", rotateEvery: 0 }),
    ).toThrow(/Invalid rotateEvery/)
  })

  it("shows a replaced message on the next frame", () => {
    const spinner = new Spinner({ label: "x", message: "y", glyphs: ["-"] })
    spinner.setMessage("z")
    expect(spinner.advance(tick(0)).text).toBe("- x: z")
  })
})

describe("StepSequence", () => {
  it("shows the step position and label", () => {
    const step = new StepSequence({
      label: "drivers",
      index: 1,
      total: 3,
      glyphs: ["|", "/"],
    })

    expect(texts(step, 3)).toEqual([
      "| [2/3] drivers...",
      "/ [2/3] drivers...",
      "| [2/3] drivers...",
    ])
    expect(step.counter()).toBe("[2/3]")
  })

  it("rejects an empty glyph sequence", () => {
    expect(
      () => new StepSequence({ label: "a", index: 0, total: 1, glyphs: [] }),
    ).toThrow(ConfigError)
  })
})
