import type { ColorSpec, Effect, FrameContent, Tick } from "../types.js"
import { spinnerGlyphs } from "./presets.js"
import { checkGlyphs } from "./spinner.js"

export interface StepSequenceOptions {
  /** Step label */
  label: string
  /** 0-based position in the sequence */
  index: number
  /** Number of steps in the sequence */
  total: number
  /** Glyph sequence (default: the "dots" preset) */
  glyphs?: readonly string[]
  color?: ColorSpec
}

/**
 * Spinner for one step of a loading sequence: "⠋ [2/3] drivers..."
 */
export class StepSequence implements Effect {
  readonly kind = "step"
  readonly label: string
  readonly index: number
  readonly total: number
  private glyphs: string[]
  private color?: ColorSpec
  private glyphIndex = 0

  constructor(options: StepSequenceOptions) {
    this.glyphs = checkGlyphs(options.glyphs ?? spinnerGlyphs("dots"))
    this.label = options.label
    this.index = options.index
    this.total = options.total
    this.color = options.color
  }

  advance(_tick: Tick): FrameContent {
    const glyph = this.glyphs[this.glyphIndex]
    this.glyphIndex = (this.glyphIndex + 1) % this.glyphs.length

    return {
      text: `${glyph} ${this.counter()} ${this.label}...`,
      attributes: this.color ? { color: this.color } : undefined,
      directive: "overwrite",
    }
  }

  reset(): void {
    this.glyphIndex = 0
  }

  /**
   * "[i/n]" with a 1-based position
   */
  counter(): string {
    return `[${this.index + 1}/${this.total}]`
  }
}
