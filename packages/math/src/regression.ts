/**
 * regression.ts
 * Integer least-squares trend fit over a price series; pure functions only (no I/O, no side-effects).
 * All arithmetic is bigint so that two runs over the same table are bit-identical.
 */
import type { HistoricalSeries, PricePoint, TrendModel } from '@trend-signal/dto'

/**
 * assertSeries
 * A fittable series has at least two points and strictly increasing timeIndex.
 */
export function assertSeries(series: HistoricalSeries): void {
  if (series.length < 2) throw new RangeError(`series needs at least 2 points, got ${series.length}`)
  for (let i = 1; i < series.length; i++) {
    if (series[i].timeIndex <= series[i - 1].timeIndex) {
      throw new RangeError(`timeIndex must be strictly increasing (index ${i})`)
    }
  }
}

/**
 * means
 * Column means with truncating division (bigint `/` rounds toward zero).
 */
export function means(series: HistoricalSeries): { meanTime: bigint; meanPrice: bigint } {
  const n = BigInt(series.length)
  let sumTime = 0n
  let sumPrice = 0n
  for (const { timeIndex, price } of series) {
    sumTime += timeIndex
    sumPrice += price
  }
  return { meanTime: sumTime / n, meanPrice: sumPrice / n }
}

/**
 * predictAt
 * Value of the fitted line at t.
 */
export function predictAt(model: Pick<TrendModel, 'slope' | 'intercept'>, t: bigint): bigint {
  return model.slope * t + model.intercept
}

/**
 * fitTrend
 * slope = Σ(dt·dp) / Σ(dt²), intercept = meanPrice − slope·meanTime.
 * confidence is R² as an integer percentage: 100·(SST − SSE) / SST clamped to [0, 100].
 * Both divisions fall back to 0 on a zero denominator.
 */
export function fitTrend(series: HistoricalSeries): TrendModel {
  assertSeries(series)
  const { meanTime, meanPrice } = means(series)

  let numerator = 0n
  let denominator = 0n
  let totalVariance = 0n
  for (const { timeIndex, price } of series) {
    const dt = timeIndex - meanTime
    const dp = price - meanPrice
    numerator += dt * dp
    denominator += dt * dt
    totalVariance += dp * dp
  }

  const slope = denominator !== 0n ? numerator / denominator : 0n
  const intercept = meanPrice - slope * meanTime

  let residualVariance = 0n
  for (const point of series) {
    const err = point.price - predictAt({ slope, intercept }, point.timeIndex)
    residualVariance += err * err
  }

  return { slope, intercept, confidence: coefficientOfDetermination(totalVariance, residualVariance) }
}

export function coefficientOfDetermination(totalVariance: bigint, residualVariance: bigint): bigint {
  if (totalVariance <= 0n) return 0n
  const ratio = ((totalVariance - residualVariance) * 100n) / totalVariance
  return clampPercent(ratio)
}

export function clampPercent(x: bigint): bigint {
  if (x < 0n) return 0n
  return x > 100n ? 100n : x
}

export function lastPoint(series: HistoricalSeries): PricePoint {
  assertSeries(series)
  return series[series.length - 1]
}
