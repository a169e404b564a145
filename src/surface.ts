import type { ChalkInstance } from "chalk"
import { type ColorMode, type OutputSink, shouldUseColors } from "./config.js"
import { RenderError } from "./errors.js"
import { createPainter, paintFrame } from "./style.js"
import type { FrameContent } from "./types.js"

/**
 * ANSI style reset
 */
const RESET = "\u001b[0m"

/**
 * ANSI cursor control codes
 */
export const cursor = {
  hide: "\u001b[?25l",
  show: "\u001b[?25h",
  moveUp: (n: number) => `\u001b[${n}A`,
  moveToStart: "\u001b[0G",
  clearLine: "\u001b[2K",
  clearDown: "\u001b[0J",
}

/**
 * Whoever drew the current live region (usually an effect runner)
 */
export type SurfaceOwner = object

/**
 * The part of the screen the latest overwrite/redraw frame occupies
 */
interface LiveRegion {
  owner: SurfaceOwner | undefined
  kind: "line" | "block"
  /** Lines above the cursor (block frames end with a newline) */
  height: number
  /** Visible width of the widest line */
  width: number
}

export interface RenderSurfaceOptions {
  /** Output target (default: process.stdout) */
  sink?: OutputSink
  /** Color mode (default: auto) */
  colors?: ColorMode
  /** Environment used for color detection */
  env?: NodeJS.ProcessEnv
}

/**
 * Serialized terminal-writing boundary.
 *
 * Owns the cursor state and the single live region. Every frame goes
 * through `write`, which never interleaves with another write: a write
 * requested while one is in flight is queued and drained in order.
 */
export class RenderSurface {
  readonly colorEnabled: boolean
  private sink: OutputSink
  private painter: ChalkInstance
  private live: LiveRegion | null = null
  private cursorHidden = false
  private writing = false
  private pending: Array<() => void> = []

  constructor(options: RenderSurfaceOptions = {}) {
    this.sink = options.sink ?? process.stdout
    this.colorEnabled = shouldUseColors(
      options.colors ?? "auto",
      this.sink,
      options.env,
    )
    this.painter = createPainter(this.colorEnabled)
  }

  /**
   * Draw one frame
   * @param owner - Identifies who owns the live region this frame creates
   */
  write(frame: FrameContent, owner?: SurfaceOwner): void {
    this.exclusive(() => this.draw(frame, owner))
  }

  /**
   * Erase the live region if `owner` drew it. Returns whether anything
   * was erased.
   */
  clear(owner: SurfaceOwner): boolean {
    if (!this.live || this.live.owner !== owner) return false

    let erased = false
    this.exclusive(() => {
      // Another queued write may have replaced the region meanwhile
      if (!this.live || this.live.owner !== owner) return
      const showCursor = this.cursorHidden ? cursor.show : ""
      this.emit(`${this.eraseLive()}${showCursor}`)
      this.live = null
      this.cursorHidden = false
      erased = true
    })
    return erased
  }

  /**
   * Restore default colors and show the cursor. Safe to call repeatedly.
   */
  restore(): void {
    if (!this.cursorHidden) return

    this.exclusive(() => {
      if (!this.cursorHidden) return
      // Keep whatever is on the live line and move below it
      const newline = this.live?.kind === "line" ? "\n" : ""
      this.emit(`${RESET}${newline}${cursor.show}`)
      this.live = null
      this.cursorHidden = false
    })
  }

  /**
   * Restore the terminal when the process is interrupted.
   * Returns a function that removes the handlers again.
   */
  installSignalHandlers(): () => void {
    const cleanup = () => {
      this.restore()
      process.exit(130)
    }
    process.on("SIGINT", cleanup)
    process.on("SIGTERM", cleanup)

    return () => {
      process.off("SIGINT", cleanup)
      process.off("SIGTERM", cleanup)
    }
  }

  /**
   * Owner of the live region, if any
   */
  liveOwner(): SurfaceOwner | undefined {
    return this.live?.owner
  }

  /**
   * Visible width of the live region (0 when there is none)
   */
  liveWidth(): number {
    return this.live?.width ?? 0
  }

  isCursorHidden(): boolean {
    return this.cursorHidden
  }

  private draw(frame: FrameContent, owner: SurfaceOwner | undefined): void {
    const { lines, widths } = paintFrame(this.painter, frame)
    const width = Math.max(...widths)
    const directive =
      frame.directive === "overwrite" && lines.length > 1
        ? "redraw"
        : frame.directive

    if (directive === "append") {
      // Keep the live line on screen and continue below it
      const newline = this.live?.kind === "line" ? "\n" : ""
      const showCursor = this.cursorHidden ? cursor.show : ""
      this.emit(`${newline}${showCursor}${lines.join("\n")}\n`)
      this.live = null
      this.cursorHidden = false
      return
    }

    const hideCursor = this.cursorHidden ? "" : cursor.hide
    const erase = this.eraseLive()

    if (directive === "overwrite") {
      this.emit(
        `${erase}${hideCursor}${cursor.clearLine}${cursor.moveToStart}${lines[0]}`,
      )
      this.live = { owner, kind: "line", height: 0, width }
    } else {
      const block = lines
        .map(line => `${cursor.clearLine}${cursor.moveToStart}${line}\n`)
        .join("")
      this.emit(`${erase}${hideCursor}${block}`)
      this.live = { owner, kind: "block", height: lines.length, width }
    }
    this.cursorHidden = true
  }

  /**
   * Escape sequence that erases the current live region
   */
  private eraseLive(): string {
    if (!this.live) return ""

    if (this.live.kind === "line") {
      return `${cursor.moveToStart}${cursor.clearLine}`
    }
    return `${cursor.moveUp(this.live.height)}${cursor.moveToStart}${cursor.clearDown}`
  }

  private exclusive(task: () => void): void {
    if (this.writing) {
      this.pending.push(task)
      return
    }

    // Queued writes still run when an earlier one fails; the first
    // failure is thrown to the outermost writer
    this.writing = true
    const failures: unknown[] = []
    let next: (() => void) | undefined = task
    while (next) {
      try {
        next()
      } catch (error) {
        failures.push(error)
      }
      next = this.pending.shift()
    }
    this.writing = false

    if (failures.length > 0) throw failures[0]
  }

  private emit(chunk: string): void {
    if (this.sink.writable === false) {
      throw new RenderError("Output stream is closed")
    }
    try {
      this.sink.write(chunk)
    } catch (error) {
      throw new RenderError("Failed to write frame", error)
    }
  }
}
