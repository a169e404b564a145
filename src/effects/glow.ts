import { ConfigError } from "../errors.js"
import {
  type CellStyle,
  COLOR_NAMES,
  type ColorName,
  type Effect,
  type FrameContent,
  type Tick,
} from "../types.js"

export interface GlowTextOptions {
  text: string
  color: ColorName
  /** Pulse speed, integer from 1 (slow) to 10 (fast) */
  intensity: number
}

/**
 * 256-color gradients, darkest first
 */
const GRADIENTS: Record<ColorName, readonly number[]> = {
  red: [52, 88, 124, 160, 196],
  green: [22, 28, 34, 40, 46],
  blue: [17, 18, 19, 20, 21],
  cyan: [27, 33, 39, 45, 51],
  magenta: [53, 90, 127, 164, 201],
  yellow: [58, 100, 142, 184, 226],
  white: [236, 240, 245, 250, 255],
}

export const MIN_INTENSITY = 1
export const MAX_INTENSITY = 10

/**
 * Frames per full pulse for an intensity
 */
export function cycleLength(intensity: number): number {
  return 2 * (MAX_INTENSITY + 2 - intensity)
}

/**
 * Brightness in [0, 1] at a phase of the cycle (0 at phase 0, 1 halfway)
 */
export function brightnessAt(phase: number, cycle: number): number {
  return (1 - Math.cos((2 * Math.PI * phase) / cycle)) / 2
}

/**
 * Text that pulses through a color gradient
 */
export class GlowText implements Effect {
  readonly kind = "glow"
  readonly text: string
  readonly color: ColorName
  readonly intensity: number
  private levels: CellStyle[]
  private cycle: number
  private phase = 0

  constructor(options: GlowTextOptions) {
    const { text, color, intensity } = options

    if (!COLOR_NAMES.includes(color)) {
      throw new ConfigError(
        "color",
        `expected one of ${COLOR_NAMES.join(", ")}, got "${color}"`,
      )
    }
    if (
      !Number.isInteger(intensity) ||
      intensity < MIN_INTENSITY ||
      intensity > MAX_INTENSITY
    ) {
      throw new ConfigError(
        "intensity",
        `expected an integer from ${MIN_INTENSITY} to ${MAX_INTENSITY}, got ${intensity}`,
      )
    }

    this.text = text
    this.color = color
    this.intensity = intensity
    this.cycle = cycleLength(intensity)
    this.levels = GRADIENTS[color].map((ansi256, level) => ({
      color: { ansi256 },
      bold: level >= 3,
    }))
  }

  advance(_tick: Tick): FrameContent {
    const brightness = brightnessAt(this.phase, this.cycle)
    this.phase = (this.phase + 1) % this.cycle

    return {
      text: `  ${this.text}  `,
      attributes: this.levels[this.levelFor(brightness)],
      directive: "overwrite",
    }
  }

  reset(): void {
    this.phase = 0
  }

  /**
   * Current position in the pulse cycle
   */
  currentPhase(): number {
    return this.phase
  }

  private levelFor(brightness: number): number {
    return Math.round(brightness * (this.levels.length - 1))
  }
}
