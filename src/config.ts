import { DEFAULT_INTERVAL_MS } from "./clock.js"
import { ConfigError } from "./errors.js"

/**
 * Minimal writable stream the render surface draws on
 */
export interface OutputSink {
  write(chunk: string): unknown
  /** False once the stream has been closed */
  writable?: boolean
  isTTY?: boolean
}

/**
 * Color mode: auto-detect, or force on/off
 */
export type ColorMode = "auto" | "always" | "never"

/**
 * Options shared by the clock and the render surface
 */
export interface EngineOptions {
  /** Tick interval in milliseconds */
  intervalMs?: number
  /** Color mode (default: auto) */
  colors?: ColorMode
  /** Output target (default: process.stdout) */
  sink?: OutputSink
  /** Restore the terminal on SIGINT/SIGTERM */
  handleSignals?: boolean
  /** Receives tick errors that no subscriber handled */
  onError?: (error: unknown) => void
}

/**
 * Helper type that requires all keys to be present but preserves original value types.
 * This is used to ensure resolveOptions handles all EngineOptions properties.
 */
type AllKeys<T> = { [K in keyof Required<T>]: T[K] }

export type ResolvedEngineOptions = Required<Omit<EngineOptions, "onError">> &
  Pick<EngineOptions, "onError">

/**
 * Read the interval override from the environment
 */
function intervalFromEnv(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.TERMFX_INTERVAL_MS
  if (raw === undefined || raw === "") return undefined

  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(
      "TERMFX_INTERVAL_MS",
      `expected a positive number, got "${raw}"`,
    )
  }
  return value
}

/**
 * Merge options with environment overrides and defaults.
 *
 * NOTE: The `satisfies AllKeys<EngineOptions>` ensures this function handles
 * all properties of EngineOptions. If you add a new option to EngineOptions,
 * TypeScript will error here until you add it to the return object.
 */
export function resolveOptions(
  options: EngineOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedEngineOptions {
  return {
    intervalMs:
      options.intervalMs ?? intervalFromEnv(env) ?? DEFAULT_INTERVAL_MS,
    colors: options.colors ?? "auto",
    sink: options.sink ?? process.stdout,
    handleSignals: options.handleSignals ?? false,
    onError: options.onError,
  } satisfies AllKeys<EngineOptions>
}

/**
 * Check if colors should be enabled for a sink
 */
export function shouldUseColors(
  mode: ColorMode,
  sink: OutputSink,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (mode === "never") return false
  if (mode === "always") return true
  if ("NO_COLOR" in env) return false
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0") return true
  if (env.TERM === "dumb") return false
  return sink.isTTY === true
}
