import { readFileSync } from "node:fs"
import { ConfigError } from "../errors.js"
import type { ColorSpec } from "../types.js"

/**
 * Style of a package-manager flavored spinner
 */
export interface PackageManagerPreset {
  glyphs: string[]
  color: ColorSpec
  messages: string[]
}

export type SpinnerPresetName =
  | "classic"
  | "dots"
  | "braille"
  | "blocks"
  | "arrows"
  | "bounce"
  | "pulse"
  | "wave"
  | "star"
  | "arc"
  | "moon"

export type PackageManagerName =
  | "npm"
  | "yarn"
  | "pnpm"
  | "bun"
  | "cargo"
  | "apt"
  | "snap"

export type BuiltinCharSet = "ascii" | "binary" | "hex" | "katakana" | "symbols"

interface PresetData {
  spinners: Record<SpinnerPresetName, string[]>
  packageManagers: Record<PackageManagerName, PackageManagerPreset>
  charSets: Record<BuiltinCharSet, string>
}

// Same relative location from src/effects and dist/effects
const PRESETS_URL = new URL("../../data/presets.json", import.meta.url)

let cached: PresetData | null = null

function loadPresets(): PresetData {
  if (!cached) {
    cached = JSON.parse(readFileSync(PRESETS_URL, "utf-8")) as PresetData
  }
  return cached
}

/**
 * Glyph sequence of a named spinner preset
 */
export function spinnerGlyphs(name: SpinnerPresetName): string[] {
  const glyphs = loadPresets().spinners[name]
  if (!glyphs) {
    throw new ConfigError("preset", `unknown spinner preset "${name}"`)
  }
  return [...glyphs]
}

/**
 * Names of all spinner presets
 */
export function spinnerPresetNames(): SpinnerPresetName[] {
  return Object.keys(loadPresets().spinners).filter(isSpinnerPresetName)
}

function isSpinnerPresetName(name: string): name is SpinnerPresetName {
  return name in loadPresets().spinners
}

/**
 * Look up a package-manager spinner style
 */
export function packageManagerPreset(
  name: PackageManagerName,
): PackageManagerPreset {
  const preset = loadPresets().packageManagers[name]
  if (!preset) {
    throw new ConfigError("manager", `unknown package manager "${name}"`)
  }
  return {
    glyphs: [...preset.glyphs],
    color: preset.color,
    messages: [...preset.messages],
  }
}

/**
 * Symbols of a built-in matrix character set
 */
export function charSetSymbols(name: BuiltinCharSet): string[] {
  const symbols = loadPresets().charSets[name]
  if (symbols === undefined) {
    throw new ConfigError("charSet", `unknown character set "${name}"`)
  }
  return Array.from(symbols)
}
