import { hexlify } from 'ethers'
import { Decision } from '@trend-signal/dto'
import { fitTrend, forecastNext } from '@trend-signal/math'
import { DecodeError } from '@trend-signal/reasons'
import { decode, encodeHex, recover } from '@trend-signal/codec'
import { PRICE_HISTORY, ASSUMED_CURRENT_NATIVE_PRICE } from '../src/series'
import { run, execute, encodeInput, decodeInput, U64_MAX } from '../src/forecaster'

const WEI = 10n ** 18n

describe('embedded price history', () => {
  it('is 30 strictly increasing days from 3200 to 3735', () => {
    expect(PRICE_HISTORY.length).toBe(30)
    expect(PRICE_HISTORY[0]).toEqual({ timeIndex: 1n, price: 3200n })
    expect(PRICE_HISTORY[29]).toEqual({ timeIndex: 30n, price: 3735n })
    expect(Object.isFrozen(PRICE_HISTORY)).toBe(true)
    expect(Object.isFrozen(PRICE_HISTORY[0])).toBe(true)
  })

  it('fits slope 18, intercept 3160, confidence 97', () => {
    expect(fitTrend(PRICE_HISTORY)).toEqual({ slope: 18n, intercept: 3160n, confidence: 97n })
    const f = forecastNext(PRICE_HISTORY)
    expect(f.nextIndex).toBe(31n)
    expect(f.forecastNative).toBe(3718n)
  })
})

describe('run', () => {
  it('upward trend at 3.6 units yields BUY', () => {
    expect(run(36n * WEI / 10n)).toEqual({
      decision: Decision.BUY,
      confidence: 97n,
      forecastValue: 4_182_750_000_000_000_000n,
    })
  })

  it('5.0 units rescales the forecast but keeps the native-space decision', () => {
    expect(run(5n * WEI)).toEqual({
      decision: Decision.BUY,
      confidence: 97n,
      forecastValue: 5_809_375_000_000_000_000n,
    })
  })

  it('decision does not depend on the observed amount', () => {
    const amounts = [0n, 1n, 3_750_000_000_000_000_000n, 5n * WEI, U64_MAX]
    for (const amount of amounts) {
      expect(run(amount).decision).toBe(Decision.BUY)
    }
  })

  it('3.7 units forecasts between 1 and 18 units', () => {
    const { forecastValue, confidence } = run(37n * WEI / 10n)
    expect(forecastValue).toBe(4_298_937_500_000_000_000n)
    expect(forecastValue > WEI && forecastValue < 18n * WEI).toBe(true)
    expect(confidence <= 100n).toBe(true)
  })

  it('a reference at the forecast threshold flips to SELL', () => {
    // 3700 + 3700/200 = 3718, and the rule is strictly greater-than
    expect(run(WEI, { referencePrice: 3700n }).decision).toBe(Decision.SELL)
  })

  it('a zero reference passes the observed amount through', () => {
    expect(run(123n, { referencePrice: 0n })).toEqual({ decision: Decision.BUY, confidence: 97n, forecastValue: 123n })
  })

  it('uses the 3200 reference by default', () => {
    expect(ASSUMED_CURRENT_NATIVE_PRICE).toBe(3200n)
  })
})

describe('execute', () => {
  it('commits the canonical encoding of run()', () => {
    const journal = execute(encodeInput(36n * WEI / 10n))
    expect(journal.length).toBe(96)
    expect(hexlify(journal)).toBe(encodeHex(run(36n * WEI / 10n)))
    expect(decode(journal)).toEqual(run(36n * WEI / 10n))
    expect(recover(journal)).toEqual(run(36n * WEI / 10n))
  })

  it('is byte-identical across runs', () => {
    const input = encodeInput(3_700_000_000_000_000_000n)
    expect(hexlify(execute(input))).toBe(hexlify(execute(input)))
  })

  it('rejects inputs wider than 64 bits', () => {
    expect(decodeInput(encodeInput(U64_MAX))).toBe(U64_MAX)
    let caught: unknown
    try {
      decodeInput(encodeInput(U64_MAX + 1n))
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(DecodeError)
    if (caught instanceof DecodeError) expect(caught.code).toBe('INPUT_OUT_OF_RANGE')
  })
})
