/**
 * abi.ts
 * Strict codec for the canonical 96-byte signal buffer: abi.encode(uint8 decision, uint256 confidence, uint256 forecastValue).
 * Each field is one 32-byte big-endian word, right-aligned.
 */
import { AbiCoder, getBytes, toBigInt } from 'ethers'
import type { BytesLike } from 'ethers'
import { Decision } from '@trend-signal/dto'
import type { ReasonDetail, SignalResult } from '@trend-signal/dto'
import { DecodeError, reason } from '@trend-signal/reasons'

export const WORD_SIZE = 32
export const CANONICAL_LENGTH = 3 * WORD_SIZE
export const CANONICAL_TYPES = ['uint8', 'uint256', 'uint256'] as const

export type DecodeOutcome =
  | { ok: true; value: SignalResult }
  | { ok: false; reason: ReasonDetail }

const coder = AbiCoder.defaultAbiCoder()

function assertEncodable(result: SignalResult): void {
  if (result.decision !== Decision.SELL && result.decision !== Decision.BUY) {
    throw new RangeError(`decision must be 0 or 1, got ${result.decision}`)
  }
  if (result.confidence < 0n) throw new RangeError('confidence must be non-negative')
  if (result.forecastValue < 0n) throw new RangeError('forecastValue must be non-negative')
}

export function encodeHex(result: SignalResult): string {
  assertEncodable(result)
  return coder.encode(CANONICAL_TYPES, [result.decision, result.confidence, result.forecastValue])
}

export function encode(result: SignalResult): Uint8Array {
  return getBytes(encodeHex(result))
}

export function readWord(bytes: Uint8Array, index: number): bigint {
  return toBigInt(bytes.subarray(index * WORD_SIZE, (index + 1) * WORD_SIZE))
}

/**
 * decodeWindow
 * Non-throwing form of decode, used by the recovery scan.
 * The whole first word is compared, so a non-zero high byte fails the same way as a decision of 2.
 */
export function decodeWindow(bytes: Uint8Array): DecodeOutcome {
  if (bytes.length !== CANONICAL_LENGTH) {
    return { ok: false, reason: reason('WRONG_LENGTH', { context: { length: bytes.length } }) }
  }
  const decisionWord = readWord(bytes, 0)
  if (decisionWord !== 0n && decisionWord !== 1n) {
    return { ok: false, reason: reason('DECISION_OUT_OF_RANGE', { context: { decision: decisionWord.toString() } }) }
  }
  return {
    ok: true,
    value: {
      decision: decisionWord === 1n ? Decision.BUY : Decision.SELL,
      confidence: readWord(bytes, 1),
      forecastValue: readWord(bytes, 2),
    },
  }
}

export function decode(data: BytesLike): SignalResult {
  const outcome = decodeWindow(getBytes(data))
  if (!outcome.ok) throw new DecodeError(outcome.reason)
  return outcome.value
}
