/**
 * recover.ts
 * Tolerant decoder: locates the canonical 96-byte tuple inside a blob that an external
 * transport has wrapped in its own framing, at an offset nobody tells us.
 *
 * Candidate order: offsets implied by a known envelope shape first, then every
 * stride-aligned offset in increasing order. One list, one loop; the first
 * window that strictly decodes and passes every plausibility rule wins.
 */
import { getBytes } from 'ethers'
import type { BytesLike } from 'ethers'
import type { SignalResult } from '@trend-signal/dto'
import { decodeError } from '@trend-signal/reasons'
import { CANONICAL_LENGTH, WORD_SIZE, decodeWindow } from './abi'
import { PlausibilityRule, defaultRules, firstFailedRule, withRequiredRules } from './plausibility'

export interface EnvelopeShape {
  minLength: number
  offset: number
}

// offset word + identifier word + two pointer words, then the journal
export const FULFILLMENT_ENVELOPE: EnvelopeShape = { minLength: 224, offset: 128 }

export interface RecoverOptions {
  // extra rules on top of REQUIRED_RULES; defaults to defaultRules()
  rules?: ReadonlyArray<PlausibilityRule>
  stride?: number
  envelopes?: ReadonlyArray<EnvelopeShape>
}

export type Recovered = {
  result: SignalResult
  offset: number
}

export function candidateOffsets(
  length: number,
  stride: number = WORD_SIZE,
  envelopes: ReadonlyArray<EnvelopeShape> = [FULFILLMENT_ENVELOPE]
): number[] {
  if (!Number.isInteger(stride) || stride <= 0) throw new RangeError(`stride must be a positive integer, got ${stride}`)
  const last = length - CANONICAL_LENGTH
  const seen = new Set<number>()
  const out: number[] = []
  const push = (offset: number) => {
    if (offset < 0 || offset > last || seen.has(offset)) return
    seen.add(offset)
    out.push(offset)
  }
  for (const env of envelopes) {
    if (length >= env.minLength) push(env.offset)
  }
  for (let offset = 0; offset <= last; offset += stride) push(offset)
  return out
}

export function recoverWithOffset(blob: BytesLike, options: RecoverOptions = {}): Recovered {
  const bytes = getBytes(blob)
  if (bytes.length < CANONICAL_LENGTH) {
    throw decodeError('TOO_SHORT', { context: { length: bytes.length } })
  }
  const rules = withRequiredRules(options.rules ?? defaultRules())
  const offsets = candidateOffsets(bytes.length, options.stride, options.envelopes)

  for (const offset of offsets) {
    const outcome = decodeWindow(bytes.subarray(offset, offset + CANONICAL_LENGTH))
    if (!outcome.ok) continue
    if (firstFailedRule(outcome.value, rules) !== undefined) continue
    return { result: outcome.value, offset }
  }

  throw decodeError('NO_VALID_TUPLE', { context: { length: bytes.length, candidates: offsets.length } })
}

export function recover(blob: BytesLike, options?: RecoverOptions): SignalResult {
  return recoverWithOffset(blob, options).result
}
