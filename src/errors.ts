/**
 * Base class for every error raised by the engine
 */
export class AnimationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Invalid construction options. Raised synchronously, before any render.
 */
export class ConfigError extends AnimationError {
  /** Name of the offending option */
  readonly option: string

  constructor(option: string, message: string) {
    super(`Invalid ${option}: ${message}`)
    this.option = option
  }
}

/**
 * The output sink rejected a write
 */
export class RenderError extends AnimationError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
  }
}

/**
 * A loading step reported failure and halted the sequence
 */
export class StepFailed extends AnimationError {
  /** 0-based index of the failed step */
  readonly index: number
  /** Label of the failed step */
  readonly label: string

  constructor(index: number, label: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ""
    super(`Step ${index + 1} (${label}) failed${reason}`, { cause })
    this.index = index
    this.label = label
  }
}
