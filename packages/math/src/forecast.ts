/**
 * forecast.ts
 * Next-step projection, unit rescaling and the buy/sell rule; pure functions only.
 */
import { Decision } from '@trend-signal/dto'
import type { HistoricalSeries, TrendModel } from '@trend-signal/dto'
import { fitTrend, lastPoint, predictAt } from './regression'

// +0.5% expressed as a divisor: ref + ref / 200
export const THRESHOLD_DIVISOR = 200n

export type NativeForecast = {
  model: TrendModel
  nextIndex: bigint
  forecastNative: bigint
}

/**
 * forecastNext
 * Fits the series and evaluates the line one step past its last timeIndex.
 */
export function forecastNext(series: HistoricalSeries): NativeForecast {
  const model = fitTrend(series)
  const nextIndex = lastPoint(series).timeIndex + 1n
  return { model, nextIndex, forecastNative: predictAt(model, nextIndex) }
}

/**
 * rescaleForecast
 * observedAmount · forecastNative / referencePrice, in the observed amount's unit.
 * A zero reference leaves the observed amount unchanged; a negative native forecast counts as 0.
 */
export function rescaleForecast(observedAmount: bigint, forecastNative: bigint, referencePrice: bigint): bigint {
  if (referencePrice === 0n) return observedAmount
  const native = forecastNative < 0n ? 0n : forecastNative
  return (observedAmount * native) / referencePrice
}

export function decisionThreshold(referencePrice: bigint): bigint {
  return referencePrice + referencePrice / THRESHOLD_DIVISOR
}

/**
 * decide
 * BUY when the native-unit forecast clears the threshold over the reference price.
 * Evaluated in native units, so the observed amount never influences it.
 */
export function decide(forecastNative: bigint, referencePrice: bigint): Decision {
  return forecastNative > decisionThreshold(referencePrice) ? Decision.BUY : Decision.SELL
}
