/**
 * One discrete step of the animation clock
 */
export interface Tick {
  /** Monotonic counter, 0 for the first dispatched tick */
  readonly index: number
  /** Logical time since the clock started (index * interval) */
  readonly elapsedMs: number
}

/**
 * How a frame is placed on the terminal
 * - overwrite: replace the current line
 * - redraw: replace the whole block drawn by the previous frame
 * - append: write a permanent line
 */
export type CursorDirective = "overwrite" | "redraw" | "append"

/**
 * Basic terminal colors accepted by effect options
 */
export type ColorName =
  | "red"
  | "green"
  | "blue"
  | "cyan"
  | "magenta"
  | "yellow"
  | "white"

export const COLOR_NAMES: readonly ColorName[] = [
  "red",
  "green",
  "blue",
  "cyan",
  "magenta",
  "yellow",
  "white",
]

/**
 * A color in one of the palettes the surface can paint
 */
export type ColorSpec =
  | ColorName
  | "brightWhite"
  | "brightGreen"
  | { ansi256: number }
  | { rgb: [number, number, number] }

/**
 * Display attributes of one character (or a whole frame)
 */
export interface CellStyle {
  color?: ColorSpec
  bold?: boolean
  dim?: boolean
}

/**
 * What to draw for one tick
 */
export interface FrameContent {
  /** Plain text, lines separated by \n */
  readonly text: string
  /**
   * Either one style for the whole text, or one slot per code point of
   * `text` (slots for \n are ignored)
   */
  readonly attributes?: CellStyle | ReadonlyArray<CellStyle | undefined>
  readonly directive: CursorDirective
}

/**
 * An animated visual behavior. Effects own their progression state but
 * never touch the terminal.
 */
export interface Effect {
  /** Variant tag */
  readonly kind: "spinner" | "glow" | "matrix" | "step" | "progress"
  /** Compute the next frame */
  advance(tick: Tick): FrameContent
  /** Return to the initial state */
  reset(): void
}
