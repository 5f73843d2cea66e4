import { Decision } from '@trend-signal/dto'
import type { SignalResult } from '@trend-signal/dto'
import { DecodeError } from '@trend-signal/reasons'
import { encode } from '../src/abi'
import { defaultRules, firstFailedRule, forecastAbove, decisionIsBinary, confidenceIsPercent, withRequiredRules } from '../src/plausibility'
import { recover, recoverWithOffset, candidateOffsets } from '../src/recover'

const a: SignalResult = { decision: Decision.BUY, confidence: 97n, forecastValue: 4_182_750_000_000_000_000n }
const b: SignalResult = { decision: Decision.SELL, confidence: 40n, forecastValue: 5_000_000_000_000_000_000n }

function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))
  let at = 0
  for (const p of parts) {
    out.set(p, at)
    at += p.length
  }
  return out
}

const filled = (n: number, v: number) => new Uint8Array(n).fill(v)

function failure(fn: () => unknown): DecodeError {
  try {
    fn()
  } catch (e) {
    if (e instanceof DecodeError) return e
    throw e
  }
  throw new Error('expected a DecodeError')
}

describe('candidateOffsets', () => {
  it('scans stride-aligned offsets up to length - 96 inclusive', () => {
    expect(candidateOffsets(96)).toEqual([0])
    expect(candidateOffsets(160)).toEqual([0, 32, 64])
  })

  it('puts the envelope offset first once the blob is long enough', () => {
    expect(candidateOffsets(224)).toEqual([128, 0, 32, 64, 96])
    expect(candidateOffsets(256)).toEqual([128, 0, 32, 64, 96, 160])
  })

  it('rejects a non-positive stride', () => {
    expect(() => candidateOffsets(96, 0)).toThrow(RangeError)
  })
})

describe('recover', () => {
  it('returns the tuple from a bare canonical buffer', () => {
    expect(recoverWithOffset(encode(a))).toEqual({ result: a, offset: 0 })
  })

  it('finds the tuple at offset 128 inside a 224-byte envelope', () => {
    const blob = concat(filled(128, 0xff), encode(a))
    expect(recoverWithOffset(blob)).toEqual({ result: a, offset: 128 })
  })

  it('prefers the envelope offset over an earlier valid window', () => {
    const blob = concat(encode(b), filled(32, 0xff), encode(a))
    expect(recoverWithOffset(blob).offset).toBe(128)
    expect(recoverWithOffset(blob, { envelopes: [] })).toEqual({ result: b, offset: 0 })
  })

  it('skips windows that decode strictly but fail the forecast floor', () => {
    // offset 0 decodes as (SELL, 0, 1); offset 32 as (SELL, 1, 97)
    const blob = concat(filled(64, 0), encode(a))
    expect(recoverWithOffset(blob)).toEqual({ result: a, offset: 64 })
  })

  it('rules are configuration: a zero floor accepts the earlier window', () => {
    const blob = concat(filled(64, 0), encode(a))
    const loose = [decisionIsBinary, confidenceIsPercent, forecastAbove(0n)]
    expect(recoverWithOffset(blob, { rules: loose })).toEqual({
      result: { decision: Decision.SELL, confidence: 0n, forecastValue: 1n },
      offset: 0,
    })
  })

  it('fails with TOO_SHORT below 96 bytes', () => {
    const err = failure(() => recover(new Uint8Array(95)))
    expect(err.code).toBe('TOO_SHORT')
    expect(err.reason.context).toEqual({ length: 95 })
  })

  it('fails with NO_VALID_TUPLE when nothing plausible is present', () => {
    const err = failure(() => recover(filled(160, 0xff)))
    expect(err.code).toBe('NO_VALID_TUPLE')
    expect(err.reason.context).toEqual({ length: 160, candidates: 3 })
  })

  it('does not find a tuple embedded off the 32-byte grid', () => {
    const blob = concat(filled(16, 0), encode(a), filled(16, 0))
    expect(failure(() => recover(blob)).code).toBe('NO_VALID_TUPLE')
  })

  it('never returns confidence above 100', () => {
    const blob = concat(encode({ ...a, confidence: 101n }), encode(b))
    expect(recoverWithOffset(blob)).toEqual({ result: b, offset: 96 })
  })

  it('keeps the confidence bound when the caller replaces the rules', () => {
    const overconfident = encode({ decision: Decision.BUY, confidence: 250n, forecastValue: 10n ** 18n })
    for (const rules of [[forecastAbove(10n ** 17n)], []]) {
      const err = failure(() => recover(overconfident, { rules }))
      expect(err.code).toBe('NO_VALID_TUPLE')
      expect(err.reason.context).toEqual({ length: 96, candidates: 1 })
    }
    const blob = concat(overconfident, encode(b))
    expect(recoverWithOffset(blob, { rules: [forecastAbove(0n)] })).toEqual({ result: b, offset: 96 })
  })
})

describe('plausibility rules', () => {
  it('names the first failed rule', () => {
    const rules = defaultRules()
    expect(firstFailedRule(a, rules)).toBeUndefined()
    expect(firstFailedRule({ ...a, confidence: 101n }, rules)).toBe('confidence-percent')
    expect(firstFailedRule({ ...a, forecastValue: 10n ** 17n }, rules)).toBe('forecast-above-100000000000000000')
  })

  it('puts the required range rules first without repeating them', () => {
    const names = (rules: ReadonlyArray<{ name: string }>) => rules.map(r => r.name)
    expect(names(withRequiredRules(defaultRules()))).toEqual(['decision-binary', 'confidence-percent', 'forecast-above-100000000000000000'])
    expect(names(withRequiredRules([forecastAbove(0n)]))).toEqual(['decision-binary', 'confidence-percent', 'forecast-above-0'])
  })
})
