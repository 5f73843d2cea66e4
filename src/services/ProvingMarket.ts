/**
 * ProvingMarket - the settlement layer the forecaster's journal travels through.
 *
 * The real market is an external collaborator: submit an input, poll until a prover
 * fulfills it, receive opaque fulfillment bytes plus a seal. LocalProvingMarket runs the
 * forecaster in process and wraps the journal in the same envelope the market returns,
 * so the receive path is exercised end to end without a network.
 */
import { AbiCoder, concat, hexlify, id, keccak256, toBeHex } from 'ethers'
import { execute } from '@trend-signal/forecaster'
import { marketError } from '@trend-signal/reasons'

export interface SubmittedRequest {
  requestId: string
  expiresAt: number
}

export interface Fulfillment {
  requestId: string
  fulfillmentData: string
  seal: string
}

export interface WaitOptions {
  intervalMs: number
  expiresAt: number
}

export interface ProvingMarket {
  submit(input: string): Promise<SubmittedRequest>
  waitForFulfillment(requestId: string, opts: WaitOptions): Promise<Fulfillment>
}

export type LocalMarketOptions = {
  imageId?: string
  ttlMs?: number
  // polls before a request reports fulfilled; models prover latency
  readyAfterPolls?: number
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

type PendingRequest = {
  journal: Uint8Array
  polls: number
}

export const DEFAULT_IMAGE_ID = id('trend-signal/forecaster')

/**
 * wrapJournal
 * abi.encode((bytes32 imageId, bytes journal)): offset word, image id, pointer to the
 * bytes, its length, then the 96-byte journal at offset 128 (224 bytes total).
 */
export function wrapJournal(imageId: string, journal: Uint8Array): string {
  return AbiCoder.defaultAbiCoder().encode(['tuple(bytes32,bytes)'], [[imageId, journal]])
}

export class LocalProvingMarket implements ProvingMarket {
  private requests = new Map<string, PendingRequest>()
  private nonce = 0
  private imageId: string
  private ttlMs: number
  private readyAfterPolls: number
  private now: () => number
  private sleep: (ms: number) => Promise<void>

  constructor(opts: LocalMarketOptions = {}) {
    this.imageId = opts.imageId ?? DEFAULT_IMAGE_ID
    this.ttlMs = opts.ttlMs ?? 600_000
    this.readyAfterPolls = Math.max(1, opts.readyAfterPolls ?? 1)
    this.now = opts.now ?? (() => Date.now())
    this.sleep = opts.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  async submit(input: string): Promise<SubmittedRequest> {
    const journal = execute(input)
    const requestId = keccak256(concat([this.imageId, input, toBeHex(this.nonce++, 32)]))
    this.requests.set(requestId, { journal, polls: 0 })
    return { requestId, expiresAt: this.now() + this.ttlMs }
  }

  async waitForFulfillment(requestId: string, opts: WaitOptions): Promise<Fulfillment> {
    const req = this.requests.get(requestId)
    if (!req) throw new Error(`unknown request ${requestId}`)
    for (;;) {
      if (this.now() > opts.expiresAt) {
        throw marketError('FULFILLMENT_TIMEOUT', { context: { requestId, polls: req.polls } })
      }
      req.polls += 1
      if (req.polls >= this.readyAfterPolls) {
        this.requests.delete(requestId)
        // no proof is produced locally; the seal is empty
        return { requestId, fulfillmentData: wrapJournal(this.imageId, req.journal), seal: hexlify(new Uint8Array(0)) }
      }
      await this.sleep(opts.intervalMs)
    }
  }
}
