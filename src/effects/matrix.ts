import { ConfigError } from "../errors.js"
import { pick, type RandomSource } from "../random.js"
import type { CellStyle, Effect, FrameContent, Tick } from "../types.js"
import { type BuiltinCharSet, charSetSymbols } from "./presets.js"

export type CharSet = BuiltinCharSet | { custom: readonly string[] }

export interface MatrixRainOptions {
  /** Symbols falling streams are made of */
  charSet: CharSet
  /** Probability in [0, 1] that an idle column spawns a stream on a tick */
  density: number
  /** Columns (default: 40) */
  width?: number
  /** Rows (default: 12) */
  height?: number
  /** Longest trail behind a head, head included (default: 6) */
  trail?: number
  /** Random source (default: Math.random) */
  random?: RandomSource
}

const HEAD: CellStyle = { color: "brightWhite", bold: true }
const NEAR: CellStyle = { color: "brightGreen" }
const MID: CellStyle = { color: "green" }
const FAR: CellStyle = { color: "green", dim: true }

/**
 * A column with no stream has head === null
 */
interface Column {
  head: number | null
  /** Trail characters, the head's first */
  buffer: string[]
}

function checkDimension(option: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(option, `expected a positive integer, got ${value}`)
  }
  return value
}

function resolveCharSet(charSet: CharSet): string[] {
  if (typeof charSet === "string") {
    return charSetSymbols(charSet)
  }
  if (charSet.custom.length === 0) {
    throw new ConfigError("charSet", "custom character set must not be empty")
  }
  for (const symbol of charSet.custom) {
    if (Array.from(symbol).length !== 1) {
      throw new ConfigError(
        "charSet",
        `custom symbols must be single characters, got "${symbol}"`,
      )
    }
  }
  return [...charSet.custom]
}

/**
 * Streams of characters falling down independent columns
 */
export class MatrixRain implements Effect {
  readonly kind = "matrix"
  readonly width: number
  readonly height: number
  readonly density: number
  private trail: number
  private symbols: string[]
  private random: RandomSource
  private columns: Column[]

  constructor(options: MatrixRainOptions) {
    const { density } = options
    if (!Number.isFinite(density) || density < 0 || density > 1) {
      throw new ConfigError(
        "density",
        `expected a number from 0 to 1, got ${density}`,
      )
    }

    this.density = density
    this.symbols = resolveCharSet(options.charSet)
    this.width = checkDimension("width", options.width ?? 40)
    this.height = checkDimension("height", options.height ?? 12)
    this.trail = checkDimension("trail", options.trail ?? 6)
    this.random = options.random ?? Math.random
    this.columns = this.emptyColumns()
  }

  advance(_tick: Tick): FrameContent {
    for (const column of this.columns) {
      if (column.head === null) {
        this.maybeSpawn(column)
      } else {
        this.fall(column)
      }
    }
    return this.render()
  }

  reset(): void {
    this.columns = this.emptyColumns()
  }

  /**
   * Number of columns with a falling stream
   */
  activeStreams(): number {
    return this.columns.filter(column => column.head !== null).length
  }

  private emptyColumns(): Column[] {
    return Array.from({ length: this.width }, () => ({
      head: null,
      buffer: [],
    }))
  }

  private maybeSpawn(column: Column): void {
    if (this.density === 0 || this.random() >= this.density) return

    column.head = 0
    column.buffer = [pick(this.random, this.symbols)]
  }

  private fall(column: Column): void {
    const head = (column.head ?? 0) + 1
    column.buffer.unshift(pick(this.random, this.symbols))
    column.buffer.length = Math.min(column.buffer.length, this.trail)

    // The tail has left the bottom row
    if (head - column.buffer.length + 1 >= this.height) {
      column.head = null
      column.buffer = []
      return
    }
    column.head = head
  }

  private render(): FrameContent {
    const rows: string[] = []
    const attributes: Array<CellStyle | undefined> = []

    for (let row = 0; row < this.height; row++) {
      let line = ""
      for (const column of this.columns) {
        const distance = column.head === null ? -1 : column.head - row
        if (distance < 0 || distance >= column.buffer.length) {
          line += " "
          attributes.push(undefined)
          continue
        }
        line += column.buffer[distance]
        attributes.push(styleFor(distance))
      }
      rows.push(line)
      // Slot for the newline
      if (row < this.height - 1) attributes.push(undefined)
    }

    return { text: rows.join("\n"), attributes, directive: "redraw" }
  }
}

function styleFor(distance: number): CellStyle {
  if (distance === 0) return HEAD
  if (distance < 3) return NEAR
  if (distance < 6) return MID
  return FAR
}
