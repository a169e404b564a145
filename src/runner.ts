import type { FrameClock, Subscription } from "./clock.js"
import type { RenderSurface } from "./surface.js"
import type { Effect, Tick } from "./types.js"

export type RunnerState = "idle" | "running"

export interface EffectRunnerOptions {
  clock: FrameClock
  surface: RenderSurface
  /**
   * Called when a render fails on a clock tick. The runner is already
   * idle by then. Without it the error is thrown from the next `stop()`
   * or `start()`.
   */
  onError?: (error: unknown) => void
}

/**
 * Binds one effect to a clock and a render surface.
 *
 * idle --start()--> running --stop()--> idle
 *
 * `start()` while running and `stop()` while idle are no-ops, except
 * that an unhandled tick failure is thrown from the next one of them.
 */
export class EffectRunner {
  readonly effect: Effect
  private clock: FrameClock
  private surface: RenderSurface
  private onError?: (error: unknown) => void
  private subscription: Subscription | null = null
  private currentState: RunnerState = "idle"
  private renderCount = 0
  private failure: unknown = undefined
  /** Tick failure nobody has seen yet */
  private unreported: { error: unknown } | null = null

  constructor(effect: Effect, options: EffectRunnerOptions) {
    this.effect = effect
    this.clock = options.clock
    this.surface = options.surface
    this.onError = options.onError
  }

  /**
   * Reset the effect, draw its first frame immediately and follow the clock
   */
  start(): void {
    if (this.currentState === "running") return
    this.throwUnreported()

    this.effect.reset()
    this.failure = undefined
    // Throws RenderError before anything is subscribed
    this.render(this.clock.current())

    this.currentState = "running"
    this.subscription = this.clock.subscribe(
      tick => this.onTick(tick),
      error => this.fail(error),
    )
  }

  /**
   * Stop following the clock and erase the region this runner drew
   */
  stop(): void {
    if (this.currentState === "idle") {
      this.throwUnreported()
      return
    }

    this.detach()
    this.surface.clear(this)
  }

  get state(): RunnerState {
    return this.currentState
  }

  isRunning(): boolean {
    return this.currentState === "running"
  }

  /**
   * Frames rendered since construction
   */
  get frames(): number {
    return this.renderCount
  }

  /**
   * Error that stopped the runner on a tick, if any
   */
  get lastError(): unknown {
    return this.failure
  }

  private onTick(tick: Tick): void {
    // A tick already dispatched when stop() ran
    if (this.currentState !== "running") return
    this.render(tick)
  }

  private render(tick: Tick): void {
    const frame = this.effect.advance(tick)
    this.surface.write(frame, this)
    this.renderCount++
  }

  private fail(error: unknown): void {
    this.detach()
    this.failure = error
    if (this.onError) {
      this.onError(error)
    } else {
      this.unreported = { error }
    }
  }

  private throwUnreported(): void {
    const pending = this.unreported
    if (!pending) return
    this.unreported = null
    throw pending.error
  }

  private detach(): void {
    this.subscription?.unsubscribe()
    this.subscription = null
    this.currentState = "idle"
  }
}
