// apps/backend/src/lib/errors.ts
import type { PhaseKey, PhaseOutputs } from '@strategy-chain/prompts'

/** Required settings are missing or malformed. Raised before any phase runs. */
export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export type GenerationFailureKind = 'transport' | 'auth' | 'rate_limit' | 'timeout' | 'malformed' | 'unknown'

/**
 * Any failure of a generation call. The runner re-raises it with the phase that
 * failed and whatever finished before, so callers can report partial progress.
 */
export class GenerationServiceError extends Error {
  readonly kind: GenerationFailureKind
  readonly status?: number
  readonly phase?: PhaseKey
  readonly completed: PhaseOutputs

  constructor(
    message: string,
    opts: {
      kind?: GenerationFailureKind
      status?: number
      phase?: PhaseKey
      completed?: PhaseOutputs
      cause?: unknown
    } = {}
  ) {
    super(message, { cause: opts.cause })
    this.name = 'GenerationServiceError'
    this.kind = opts.kind ?? 'unknown'
    this.status = opts.status
    this.phase = opts.phase
    this.completed = opts.completed ?? new Map()
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /** Same failure, pinned to the phase it interrupted. */
  withPhase(phase: PhaseKey, completed: PhaseOutputs): GenerationServiceError {
    return new GenerationServiceError(this.message, {
      kind: this.kind,
      status: this.status,
      phase,
      completed,
      cause: this.cause,
    })
  }
}

/** A phase was scheduled before the outputs it reads existed. */
export class PhaseOrderError extends Error {
  readonly phase: PhaseKey
  readonly missing: PhaseKey[]

  constructor(phase: PhaseKey, missing: PhaseKey[]) {
    super(`Phase "${phase}" cannot run before ${missing.map((m) => `"${m}"`).join(', ')}`)
    this.name = 'PhaseOrderError'
    this.phase = phase
    this.missing = missing
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

/** Maps an HTTP status (when the transport exposes one) onto a failure kind. */
export function kindFromStatus(status: number | undefined): GenerationFailureKind {
  if (status === undefined) return 'transport'
  if (status === 401 || status === 403) return 'auth'
  if (status === 429) return 'rate_limit'
  if (status === 408) return 'timeout'
  return 'transport'
}
