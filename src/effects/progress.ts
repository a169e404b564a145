import { ConfigError } from "../errors.js"
import type {
  CellStyle,
  ColorSpec,
  Effect,
  FrameContent,
  Tick,
} from "../types.js"

export type ProgressStyle = "blocks" | "arrows" | "dots" | "lines"

const STYLES: Record<ProgressStyle, { fill: string; empty: string }> = {
  blocks: { fill: "█", empty: "░" },
  arrows: { fill: "▶", empty: "▷" },
  dots: { fill: "●", empty: "○" },
  lines: { fill: "═", empty: "─" },
}

export interface ProgressBarOptions {
  /** Text shown before the bar */
  label?: string
  /** Value that counts as complete (default: 100) */
  total?: number
  /** Bar width in characters (default: 40) */
  width?: number
  /** Fill characters (default: blocks) */
  style?: ProgressStyle
  /** Color of the bar */
  color?: ColorSpec
  /** Append an estimate of the remaining time */
  showEta?: boolean
}

function positiveInteger(option: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(option, `expected a positive integer, got ${value}`)
  }
  return value
}

/**
 * Horizontal bar filled in proportion to reported progress:
 * "label [████░░░░] 50.0% (5/10)"
 *
 * `update` and `increment` only record the value; it shows on the next
 * frame.
 */
export class ProgressBar implements Effect {
  readonly kind = "progress"
  readonly label?: string
  readonly total: number
  private width: number
  private fill: string
  private empty: string
  private style?: CellStyle
  private showEta: boolean
  private value = 0
  private startedAt: number | null = null

  constructor(options: ProgressBarOptions = {}) {
    this.label = options.label
    this.total = positiveInteger("total", options.total ?? 100)
    this.width = positiveInteger("width", options.width ?? 40)
    const style = options.style ?? "blocks"
    if (!(style in STYLES)) {
      throw new ConfigError("style", `unknown progress style "${style}"`)
    }
    this.fill = STYLES[style].fill
    this.empty = STYLES[style].empty
    this.style = options.color ? { color: options.color } : undefined
    this.showEta = options.showEta ?? false
  }

  /**
   * Set the progress, clamped to 0..total
   */
  update(value: number): void {
    if (!Number.isFinite(value)) {
      throw new ConfigError("value", `expected a finite number, got ${value}`)
    }
    this.value = Math.min(Math.max(value, 0), this.total)
  }

  increment(amount = 1): void {
    this.update(this.value + amount)
  }

  get current(): number {
    return this.value
  }

  isComplete(): boolean {
    return this.value >= this.total
  }

  /**
   * "(current/total)"
   */
  counter(): string {
    return `(${this.value}/${this.total})`
  }

  advance(tick: Tick): FrameContent {
    if (this.startedAt === null) this.startedAt = tick.elapsedMs

    const ratio = this.value / this.total
    const filled = Math.floor(ratio * this.width)
    const bar =
      this.fill.repeat(filled) + this.empty.repeat(this.width - filled)
    const prefix = this.label ? `${this.label} ` : ""

    let text = `${prefix}[${bar}] ${(ratio * 100).toFixed(1)}% ${this.counter()}`
    const eta = this.eta(tick)
    if (eta !== null) text += ` ETA: ${eta.toFixed(1)}s`

    return {
      text,
      attributes: this.barStyle(prefix),
      directive: "overwrite",
    }
  }

  reset(): void {
    this.value = 0
    this.startedAt = null
  }

  /**
   * Seconds left at the average rate so far, on the clock's timeline
   */
  private eta(tick: Tick): number | null {
    if (!this.showEta || this.value === 0 || this.isComplete()) return null
    const elapsed = tick.elapsedMs - (this.startedAt ?? tick.elapsedMs)
    return ((elapsed / this.value) * (this.total - this.value)) / 1000
  }

  /**
   * Color only the bracketed bar
   */
  private barStyle(prefix: string): Array<CellStyle | undefined> | undefined {
    if (!this.style) return undefined

    const start = Array.from(prefix).length
    const end = start + this.width + 2
    return Array.from({ length: end }, (_, i) =>
      i >= start ? this.style : undefined,
    )
  }
}
