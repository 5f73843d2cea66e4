/**
 * SignalPipeline
 * One round trip: observed amount -> market request -> fulfillment -> recovered signal -> ledger.
 */
import { formatEther, hexlify, getBytes } from 'ethers'
import { encodeInput } from '@trend-signal/forecaster'
import type { ProvingMarket } from './ProvingMarket'
import type { SignalLedger, StoredSignal } from './SignalLedger'
import { resolveSignal } from './FulfillmentResolver'
import type { ResolveOptions, ResolvedSignal } from './FulfillmentResolver'
import { getLogger } from '../utils/logger'

export type PipelineDeps = {
  market: ProvingMarket
  ledger?: SignalLedger
  pollIntervalMs: number
  resolve?: ResolveOptions
}

export type PipelineOutcome = {
  requestId: string
  signal: ResolvedSignal
  published?: { txHash: string; blockNumber: number; latest: StoredSignal }
}

export async function runSignalRequest(observedAmount: bigint, deps: PipelineDeps): Promise<PipelineOutcome> {
  const log = getLogger()
  log.info({ event: 'signal.request.input', observed_wei: observedAmount.toString(), observed_eth: formatEther(observedAmount) })

  const { requestId, expiresAt } = await deps.market.submit(encodeInput(observedAmount))
  log.info({ event: 'signal.request.submitted', request_id: requestId, expires_at: expiresAt })

  const fulfillment = await deps.market.waitForFulfillment(requestId, { intervalMs: deps.pollIntervalMs, expiresAt })
  const data = getBytes(fulfillment.fulfillmentData)
  log.info({ event: 'signal.request.fulfilled', request_id: requestId, length: data.length })
  log.debug({ event: 'signal.request.payload', request_id: requestId, hex: hexlify(data) })

  const signal = resolveSignal(data, deps.resolve)

  if (!deps.ledger) {
    log.info({ event: 'signal.publish.skipped', request_id: requestId, reason: 'ledger not configured' })
    return { requestId, signal }
  }

  const { txHash, blockNumber } = await deps.ledger.publish(signal.result, fulfillment.seal)
  const latest = await deps.ledger.latest()
  return { requestId, signal, published: { txHash, blockNumber, latest } }
}
