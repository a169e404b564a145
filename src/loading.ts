import type { FrameClock } from "./clock.js"
import {
  type PackageManagerName,
  packageManagerPreset,
} from "./effects/presets.js"
import { ProgressBar, type ProgressBarOptions } from "./effects/progress.js"
import { Spinner, type SpinnerOptions } from "./effects/spinner.js"
import { StepSequence } from "./effects/step.js"
import { ConfigError, StepFailed } from "./errors.js"
import { EffectRunner } from "./runner.js"
import type { RenderSurface } from "./surface.js"
import type { CellStyle, Effect, FrameContent } from "./types.js"

/**
 * Step passed to completion signals
 */
export interface StepContext {
  /** 0-based position */
  index: number
  label: string
  total: number
}

/**
 * What a completion signal reports. Resolving with nothing means success.
 */
export type StepOutcome = "ok" | "failed" | undefined

/**
 * When a step counts as complete
 * - on_signal: when the caller's signal settles
 * - on_fixed_duration: after a fixed display time, or earlier when
 *   `work` settles
 */
export type CompletionPolicy =
  | {
      policy: "on_signal"
      signal: (step: StepContext) => Promise<StepOutcome | void>
    }
  | {
      policy: "on_fixed_duration"
      durationMs: number
      work?: (step: StepContext) => Promise<StepOutcome | void>
    }

export interface SystemUpdateOptions {
  /** Step labels, in order */
  steps: readonly string[]
  completion: CompletionPolicy
}

export interface SystemUpdateResult {
  /** Labels of completed steps */
  completed: string[]
  durationMs: number
}

export interface LoadingManagerOptions {
  clock: FrameClock
  surface: RenderSurface
  /** Glyphs of step spinners (default: the "dots" preset) */
  glyphs?: readonly string[]
}

type StepRun<R> = { ok: true; value: R } | { ok: false; cause: unknown }

const OK: CellStyle = { color: "green" }
const FAIL: CellStyle = { color: "red" }
const DONE: CellStyle = { color: "brightGreen", bold: true }

/**
 * Permanent line whose first character (the mark) is colored
 */
function markLine(style: CellStyle, text: string): FrameContent {
  return { text, attributes: [style], directive: "append" }
}

/**
 * Resolves after `ms` unless cancelled first
 */
function timer(ms: number): { elapsed: Promise<void>; cancel(): void } {
  let handle: ReturnType<typeof setTimeout> | undefined
  const elapsed = new Promise<void>(resolve => {
    handle = setTimeout(resolve, ms)
  })
  return { elapsed, cancel: () => clearTimeout(handle) }
}

/**
 * Run `wait` now and capture how it settles
 */
async function settle<R>(wait: () => Promise<R>): Promise<StepRun<R>> {
  try {
    return { ok: true, value: await wait() }
  } catch (cause) {
    return { ok: false, cause }
  }
}

function validateSteps(options: SystemUpdateOptions): void {
  if (options.steps.length === 0) {
    throw new ConfigError("steps", "step list must not be empty")
  }
  options.steps.forEach((step, index) => {
    if (step.trim() === "") {
      throw new ConfigError("steps", `step ${index + 1} has an empty label`)
    }
  })

  const { completion } = options
  if (
    completion.policy === "on_fixed_duration" &&
    (!Number.isFinite(completion.durationMs) || completion.durationMs < 0)
  ) {
    throw new ConfigError(
      "durationMs",
      `expected a non-negative number, got ${completion.durationMs}`,
    )
  }
}

/**
 * Runs work behind transient spinners, one at a time. Calls made while
 * another one is still running wait for it to settle.
 */
export class LoadingManager {
  private clock: FrameClock
  private surface: RenderSurface
  private glyphs?: readonly string[]
  private active: EffectRunner | null = null
  private tail: Promise<void> | null = null

  constructor(options: LoadingManagerOptions) {
    this.clock = options.clock
    this.surface = options.surface
    this.glyphs = options.glyphs
  }

  /**
   * Show each step with its own spinner, strictly in order, and mark it
   * done before the next one starts. A failed step halts the sequence.
   */
  systemUpdate(options: SystemUpdateOptions): Promise<SystemUpdateResult> {
    // Invalid options throw here, before anything is drawn
    validateSteps(options)
    return this.enqueue(() => this.runSequence(options))
  }

  private async runSequence(
    options: SystemUpdateOptions,
  ): Promise<SystemUpdateResult> {
    const startedAt = Date.now()
    const total = options.steps.length
    const completed: string[] = []

    for (const [index, label] of options.steps.entries()) {
      const step: StepContext = { index, label, total }
      const effect = new StepSequence({
        label,
        index,
        total,
        glyphs: this.glyphs,
      })

      const run = await this.runStep(effect, () =>
        this.waitForCompletion(options.completion, step),
      )

      if (!run.ok || run.value === "failed") {
        this.surface.write(
          markLine(FAIL, `✗ ${effect.counter()} ${label} failed`),
        )
        throw new StepFailed(index, label, run.ok ? undefined : run.cause)
      }

      this.surface.write(markLine(OK, `✓ ${effect.counter()} ${label} done`))
      completed.push(label)
    }

    this.surface.write(markLine(DONE, `✓ All ${total} steps completed`))

    return { completed, durationMs: Date.now() - startedAt }
  }

  /**
   * Run a task behind a spinner and return its result
   */
  async runWithSpinner<T>(
    task: () => Promise<T>,
    options: SpinnerOptions,
  ): Promise<T> {
    const spinner = new Spinner({ glyphs: this.glyphs, ...options })
    return this.enqueue(() =>
      this.runLabelled(
        spinner,
        task,
        () => `${options.label}: ${options.message}`,
      ),
    )
  }

  /**
   * Run a task behind a package-manager styled spinner
   */
  async packageInstall<T>(
    manager: PackageManagerName,
    task: () => Promise<T>,
    message?: string,
  ): Promise<T> {
    const preset = packageManagerPreset(manager)
    const shown = message ?? preset.messages[0]
    const spinner = new Spinner({
      label: manager,
      message: shown,
      glyphs: preset.glyphs,
      color: preset.color,
      // A caller-provided message stays put
      messages: message ? undefined : preset.messages,
    })
    return this.enqueue(() =>
      this.runLabelled(spinner, task, () => `${manager}: ${shown}`),
    )
  }

  /**
   * Run a task that reports progress through the bar it is handed
   */
  async runWithProgress<T>(
    task: (progress: ProgressBar) => Promise<T>,
    options: ProgressBarOptions = {},
  ): Promise<T> {
    const bar = new ProgressBar(options)
    const label = options.label ?? "Progress"
    return this.enqueue(() =>
      this.runLabelled(
        bar,
        () => task(bar),
        () => `${label} ${bar.counter()}`,
      ),
    )
  }

  /**
   * Runner of the step currently on screen
   */
  activeRunner(): EffectRunner | null {
    return this.active
  }

  private async runLabelled<T>(
    effect: Effect,
    task: () => Promise<T>,
    describe: () => string,
  ): Promise<T> {
    const run = await this.runStep(effect, task)

    if (!run.ok) {
      this.surface.write(markLine(FAIL, `✗ ${describe()}`))
      throw run.cause
    }
    this.surface.write(markLine(OK, `✓ ${describe()}`))
    return run.value
  }

  /**
   * Run `job` once every earlier call has settled
   */
  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.tail ? this.tail.then(job) : job()
    const settled = (): void => {
      if (this.tail === tail) this.tail = null
    }
    const tail: Promise<void> = run.then(settled, settled)
    this.tail = tail
    return run
  }

  /**
   * Animate `effect` until `wait` settles. The runner is always stopped
   * before this returns. A render failure on a tick rejects with the
   * RenderError instead of waiting any longer.
   */
  private async runStep<R>(
    effect: Effect,
    wait: () => Promise<R>,
  ): Promise<StepRun<R>> {
    let renderFailed: (error: unknown) => void = () => {}
    const rendering = new Promise<never>((_, reject) => {
      renderFailed = reject
    })
    const runner = new EffectRunner(effect, {
      clock: this.clock,
      surface: this.surface,
      onError: error => renderFailed(error),
    })
    runner.start()
    this.active = runner

    try {
      return await Promise.race([settle(wait), rendering])
    } finally {
      if (this.active === runner) this.active = null
      runner.stop()
    }
  }

  private async waitForCompletion(
    completion: CompletionPolicy,
    step: StepContext,
  ): Promise<StepOutcome | void> {
    if (completion.policy === "on_signal") {
      return completion.signal(step)
    }

    const { elapsed, cancel } = timer(completion.durationMs)
    if (!completion.work) return elapsed
    try {
      return await Promise.race([completion.work(step), elapsed])
    } finally {
      cancel()
    }
  }
}
