// Clock
export {
  DEFAULT_INTERVAL_MS,
  FrameClock,
  type FrameClockOptions,
  IntervalTickSource,
  ManualTickSource,
  type Subscription,
  type TickCallback,
  type TickSource,
} from "./clock.js"
// Config
export {
  type ColorMode,
  type EngineOptions,
  type OutputSink,
  type ResolvedEngineOptions,
  resolveOptions,
  shouldUseColors,
} from "./config.js"
// Effects
export {
  brightnessAt,
  cycleLength,
  GlowText,
  type GlowTextOptions,
} from "./effects/glow.js"
export {
  type CharSet,
  MatrixRain,
  type MatrixRainOptions,
} from "./effects/matrix.js"
export {
  ProgressBar,
  type ProgressBarOptions,
  type ProgressStyle,
} from "./effects/progress.js"
export {
  type BuiltinCharSet,
  charSetSymbols,
  type PackageManagerName,
  type PackageManagerPreset,
  packageManagerPreset,
  spinnerGlyphs,
  spinnerPresetNames,
  type SpinnerPresetName,
} from "./effects/presets.js"
export { Spinner, type SpinnerOptions } from "./effects/spinner.js"
export { StepSequence, type StepSequenceOptions } from "./effects/step.js"
// Errors
export {
  AnimationError,
  ConfigError,
  RenderError,
  StepFailed,
} from "./errors.js"
// Loading manager
export {
  type CompletionPolicy,
  LoadingManager,
  type LoadingManagerOptions,
  type StepContext,
  type StepOutcome,
  type SystemUpdateOptions,
  type SystemUpdateResult,
} from "./loading.js"
export { createRandom, pick, type RandomSource } from "./random.js"
// Runner
export { EffectRunner, type RunnerState } from "./runner.js"
// Surface
export { cursor, RenderSurface, type SurfaceOwner } from "./surface.js"
export type {
  CellStyle,
  ColorName,
  ColorSpec,
  CursorDirective,
  Effect,
  FrameContent,
  Tick,
} from "./types.js"

import { FrameClock, type TickSource } from "./clock.js"
import { type EngineOptions, resolveOptions } from "./config.js"
import { LoadingManager } from "./loading.js"
import { EffectRunner } from "./runner.js"
import { RenderSurface } from "./surface.js"
// Engine facade
import type { Effect } from "./types.js"

/**
 * One clock and one surface shared by every effect started through it
 */
export interface Engine {
  clock: FrameClock
  surface: RenderSurface
  /** Wrap an effect in a runner (not started) */
  runner(effect: Effect, onError?: (error: unknown) => void): EffectRunner
  /** Start an effect right away and return its runner */
  animate(effect: Effect, onError?: (error: unknown) => void): EffectRunner
  /** Loading manager drawing on this engine */
  loading(glyphs?: readonly string[]): LoadingManager
  /**
   * Stop every runner this engine created (loading steps included),
   * restore the terminal and remove signal handlers
   */
  dispose(): void
}

/**
 * Create an engine with resolved options
 */
export function createEngine(
  options?: EngineOptions,
  source?: TickSource,
): Engine {
  const resolved = resolveOptions(options)
  const clock = new FrameClock({
    intervalMs: resolved.intervalMs,
    source,
    onError: resolved.onError,
  })
  const surface = new RenderSurface({
    sink: resolved.sink,
    colors: resolved.colors,
  })
  const removeHandlers = resolved.handleSignals
    ? surface.installSignalHandlers()
    : null

  const runners = new Set<EffectRunner>()
  const managers = new Set<LoadingManager>()
  const runner = (effect: Effect, onError?: (error: unknown) => void) => {
    const created = new EffectRunner(effect, { clock, surface, onError })
    runners.add(created)
    return created
  }

  return {
    clock,
    surface,
    runner,
    animate(effect, onError) {
      const started = runner(effect, onError)
      started.start()
      return started
    },
    loading(glyphs) {
      const manager = new LoadingManager({ clock, surface, glyphs })
      managers.add(manager)
      return manager
    },
    dispose() {
      try {
        for (const created of runners) created.stop()
        for (const manager of managers) manager.activeRunner()?.stop()
      } finally {
        runners.clear()
        managers.clear()
        removeHandlers?.()
        surface.restore()
      }
    },
  }
}
