/**
 * ReasonedError
 * Wraps a ReasonDetail so every codec, recovery and market failure has one deterministic shape.
 * Callers branch on `code`; `reason.context` carries the offending sizes or values.
 */
import type { ReasonCode, ReasonDetail } from '@trend-signal/dto'

export class ReasonedError extends Error {
  public readonly reason: ReasonDetail

  constructor(reason: ReasonDetail) {
    super(reason.message)
    this.name = 'ReasonedError'
    this.reason = reason
  }

  get code(): ReasonCode {
    return this.reason.code
  }
}

// Failures of the canonical codec, the recovery scan and forecaster input parsing
export class DecodeError extends ReasonedError {
  constructor(reason: ReasonDetail) {
    super(reason)
    this.name = 'DecodeError'
  }
}

export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError
}
