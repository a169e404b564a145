import { ConfigError } from "../errors.js"
import type { ColorSpec, Effect, FrameContent, Tick } from "../types.js"
import { spinnerGlyphs } from "./presets.js"

export interface SpinnerOptions {
  /** Prefix shown before the message (e.g. "npm") */
  label: string
  /** Descriptive message */
  message: string
  /** Glyph sequence (default: the "dots" preset) */
  glyphs?: readonly string[]
  /** Color of the whole line */
  color?: ColorSpec
  /** Messages to cycle through */
  messages?: readonly string[]
  /** Frames between message changes (default: 50) */
  rotateEvery?: number
}

/**
 * Validate a glyph sequence, shared by every spinner-like effect
 */
export function checkGlyphs(glyphs: readonly string[]): string[] {
  if (glyphs.length === 0) {
    throw new ConfigError("glyphs", "glyph sequence must not be empty")
  }
  return [...glyphs]
}

/**
 * Rotating glyph followed by "label: message"
 */
export class Spinner implements Effect {
  readonly kind = "spinner"
  readonly label: string
  private glyphs: string[]
  private color?: ColorSpec
  private messages: string[]
  private rotateEvery: number
  private initialMessage: string
  private message: string
  private index = 0
  private framesSinceRotate = 0
  private messageIndex = 0

  constructor(options: SpinnerOptions) {
    this.glyphs = checkGlyphs(options.glyphs ?? spinnerGlyphs("dots"))
    this.label = options.label
    this.color = options.color
    this.initialMessage = options.message
    this.message = options.message
    this.messages = [...(options.messages ?? [])]
    this.rotateEvery = options.rotateEvery ?? 50

    if (!Number.isInteger(this.rotateEvery) || this.rotateEvery < 1) {
      throw new ConfigError(
        "rotateEvery",
        `expected a positive integer, got ${this.rotateEvery}`,
      )
    }
  }

  advance(_tick: Tick): FrameContent {
    const glyph = this.glyphs[this.index]
    this.index = (this.index + 1) % this.glyphs.length
    this.rotateMessage()

    return {
      text: `${glyph} ${this.label}: ${this.message}`,
      attributes: this.color ? { color: this.color } : undefined,
      directive: "overwrite",
    }
  }

  reset(): void {
    this.index = 0
    this.framesSinceRotate = 0
    this.messageIndex = 0
    this.message = this.initialMessage
  }

  /**
   * Replace the message shown from the next frame on
   */
  setMessage(message: string): void {
    this.message = message
  }

  /**
   * Index of the glyph the next frame shows
   */
  glyphIndex(): number {
    return this.index
  }

  private rotateMessage(): void {
    if (this.messages.length === 0) return

    this.framesSinceRotate++
    if (this.framesSinceRotate >= this.rotateEvery) {
      this.framesSinceRotate = 0
      this.message = this.messages[this.messageIndex]
      this.messageIndex = (this.messageIndex + 1) % this.messages.length
    }
  }
}
