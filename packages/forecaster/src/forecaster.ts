/**
 * Forecaster
 * The isolated program: one ABI-encoded uint256 in, one 96-byte journal out.
 * Only integer arithmetic over the embedded table, so repeated runs commit identical bytes.
 */
import { AbiCoder, getBytes } from 'ethers'
import type { BytesLike } from 'ethers'
import type { HistoricalSeries, SignalResult } from '@trend-signal/dto'
import { decide, forecastNext, rescaleForecast } from '@trend-signal/math'
import { decodeError } from '@trend-signal/reasons'
import { encode } from '@trend-signal/codec'
import { ASSUMED_CURRENT_NATIVE_PRICE, PRICE_HISTORY } from './series'

export const U64_MAX = 2n ** 64n - 1n

export interface ForecasterOptions {
  series?: HistoricalSeries
  referencePrice?: bigint
}

export function run(observedAmount: bigint, options: ForecasterOptions = {}): SignalResult {
  const series = options.series ?? PRICE_HISTORY
  const referencePrice = options.referencePrice ?? ASSUMED_CURRENT_NATIVE_PRICE
  const { model, forecastNative } = forecastNext(series)
  return {
    decision: decide(forecastNative, referencePrice),
    confidence: model.confidence,
    forecastValue: rescaleForecast(observedAmount, forecastNative, referencePrice),
  }
}

export function encodeInput(observedAmount: bigint): string {
  return AbiCoder.defaultAbiCoder().encode(['uint256'], [observedAmount])
}

/**
 * decodeInput
 * Reads the single uint256 word. Amounts past the u64 range are rejected rather than truncated.
 */
export function decodeInput(input: BytesLike): bigint {
  const [value] = AbiCoder.defaultAbiCoder().decode(['uint256'], getBytes(input))
  if (typeof value !== 'bigint') throw new TypeError('input did not decode to an integer')
  if (value > U64_MAX) {
    throw decodeError('INPUT_OUT_OF_RANGE', { context: { observedAmount: value.toString() } })
  }
  return value
}

export function execute(input: BytesLike, options?: ForecasterOptions): Uint8Array {
  return encode(run(decodeInput(input), options))
}
