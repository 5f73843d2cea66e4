/**
 * reason() factory
 * Merges a base registry entry with optional overrides.
 * Defaults come from REASONS; overrides can change `message` and add `context`.
 * Adding new codes: extend REASONS in the dto package. Keep codes stable once published.
 */
import { REASONS } from '@trend-signal/dto'
import type { DecodeErrorCode, MarketErrorCode, ReasonCode, ReasonDetail } from '@trend-signal/dto'
import { DecodeError, ReasonedError } from './errors'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'context'>>

export function reason(code: ReasonCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = REASONS[code]
  const context = { ...(base.context || {}), ...(overrides?.context || {}) }
  return {
    ...base,
    message: overrides?.message ?? base.message,
    context: Object.keys(context).length ? context : undefined,
  }
}

export function decodeError(code: DecodeErrorCode, overrides?: ReasonOverrides): DecodeError {
  return new DecodeError(reason(code, overrides))
}

export function marketError(code: MarketErrorCode, overrides?: ReasonOverrides): ReasonedError {
  return new ReasonedError(reason(code, overrides))
}
