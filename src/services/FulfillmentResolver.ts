/**
 * FulfillmentResolver
 * Turns opaque fulfillment bytes into a SignalResult via the tolerant codec.
 * A recovery failure propagates unless the caller hands in an explicit fallback,
 * and using that fallback is always logged at warn level.
 */
import { dataLength } from 'ethers'
import type { BytesLike } from 'ethers'
import type { SignalResult } from '@trend-signal/dto'
import { isDecodeError } from '@trend-signal/reasons'
import { recoverWithOffset } from '@trend-signal/codec'
import type { RecoverOptions } from '@trend-signal/codec'
import { getLogger, signalFields } from '../utils/logger'

export interface ResolveOptions {
  fallback?: SignalResult
  recover?: RecoverOptions
}

export type ResolvedSignal =
  | { source: 'payload'; result: SignalResult; offset: number }
  | { source: 'fallback'; result: SignalResult; offset: null }

export function resolveSignal(fulfillmentData: BytesLike, opts: ResolveOptions = {}): ResolvedSignal {
  const length = dataLength(fulfillmentData)
  try {
    const { result, offset } = recoverWithOffset(fulfillmentData, opts.recover)
    getLogger().info({ event: 'signal.recovered', length, offset, ...signalFields(result) })
    return { source: 'payload', result, offset }
  } catch (err) {
    if (!isDecodeError(err) || !opts.fallback) throw err
    getLogger().warn({ event: 'signal.fallback', length, code: err.code, ...signalFields(opts.fallback) })
    return { source: 'fallback', result: opts.fallback, offset: null }
  }
}
