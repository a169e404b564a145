import { Chalk, type ChalkInstance } from "chalk"
import type { CellStyle, ColorSpec, FrameContent } from "./types.js"

/**
 * Create a chalk instance with colors forced on or off
 */
export function createPainter(colorEnabled: boolean): ChalkInstance {
  // Level 2 is the 256-color palette, enough for every gradient we draw
  return new Chalk({ level: colorEnabled ? 2 : 0 })
}

function applyColor(painter: ChalkInstance, color: ColorSpec): ChalkInstance {
  if (typeof color === "string") {
    switch (color) {
      case "brightWhite":
        return painter.whiteBright
      case "brightGreen":
        return painter.greenBright
      default:
        return painter[color]
    }
  }
  if ("ansi256" in color) {
    return painter.ansi256(color.ansi256)
  }
  return painter.rgb(...color.rgb)
}

/**
 * Apply a cell style to a run of text
 */
export function paintRun(
  painter: ChalkInstance,
  style: CellStyle | undefined,
  text: string,
): string {
  if (!style || painter.level === 0) return text

  let styled = painter
  if (style.color) styled = applyColor(styled, style.color)
  if (style.bold) styled = styled.bold
  if (style.dim) styled = styled.dim
  return styled(text)
}

function isStyleList(
  attributes: NonNullable<FrameContent["attributes"]>,
): attributes is ReadonlyArray<CellStyle | undefined> {
  return Array.isArray(attributes)
}

/**
 * Rendered form of a frame: styled lines plus their visible widths
 */
export interface PaintedFrame {
  lines: string[]
  widths: number[]
}

/**
 * Split a frame into lines and paint each character run with its style.
 * Consecutive characters sharing a style object are painted together.
 */
export function paintFrame(
  painter: ChalkInstance,
  frame: FrameContent,
): PaintedFrame {
  const chars = Array.from(frame.text)
  const { attributes } = frame
  const styleAt = (i: number): CellStyle | undefined => {
    if (!attributes) return undefined
    if (isStyleList(attributes)) return attributes[i]
    return attributes
  }

  const lines: string[] = []
  const widths: number[] = []
  let line = ""
  let width = 0
  let run = ""
  let runStyle: CellStyle | undefined

  const flushRun = () => {
    if (run) line += paintRun(painter, runStyle, run)
    run = ""
  }

  chars.forEach((char, i) => {
    if (char === "\n") {
      flushRun()
      lines.push(line)
      widths.push(width)
      line = ""
      width = 0
      return
    }
    const style = styleAt(i)
    if (style !== runStyle) {
      flushRun()
      runStyle = style
    }
    run += char
    width++
  })
  flushRun()
  lines.push(line)
  widths.push(width)

  return { lines, widths }
}
