/**
 * SignalLedger - on-chain sink for the verified signal.
 * setSignal(action, confidence, predictedPrice, seal) stores it; getLatestSignal() reads it back.
 */
import { Contract, Result, hexlify } from 'ethers'
import type { BytesLike, ContractRunner } from 'ethers'
import { z } from 'zod'
import { Decision } from '@trend-signal/dto'
import type { SignalResult } from '@trend-signal/dto'
import { getLogger, signalFields } from '../utils/logger'

export const TRADING_SIGNAL_ABI = [
  'function setSignal(uint8 action, uint256 confidence, uint256 predictedPrice, bytes seal)',
  'function getLatestSignal() view returns (tuple(uint8 action, uint256 confidence, uint256 predictedPrice, uint256 timestamp))',
]

export const TX_TIMEOUT_MS = 30_000

export interface StoredSignal {
  action: Decision
  confidence: bigint
  predictedPrice: bigint
  timestamp: bigint
}

export interface PendingTx {
  hash: string
  wait(confirms?: number, timeout?: number): Promise<{ blockNumber: number } | null>
}

export interface LedgerContract {
  setSignal(action: Decision, confidence: bigint, predictedPrice: bigint, seal: string): Promise<PendingTx>
  getLatestSignal(): Promise<StoredSignal>
}

const StoredSignalSchema = z.object({
  action: z.bigint().refine(v => v === 0n || v === 1n, 'action must be 0 or 1'),
  confidence: z.bigint(),
  predictedPrice: z.bigint(),
  timestamp: z.bigint(),
})

export function parseStoredSignal(raw: unknown): StoredSignal {
  const obj = raw instanceof Result ? raw.toObject() : raw
  const res = StoredSignalSchema.safeParse(obj)
  if (!res.success) throw new Error(`Unexpected getLatestSignal result: ${res.error.message}`)
  const { action, confidence, predictedPrice, timestamp } = res.data
  return { action: action === 1n ? Decision.BUY : Decision.SELL, confidence, predictedPrice, timestamp }
}

export function ethersLedger(address: string, runner: ContractRunner): LedgerContract {
  const contract = new Contract(address, TRADING_SIGNAL_ABI, runner)
  return {
    setSignal: (action, confidence, predictedPrice, seal) =>
      contract.getFunction('setSignal').send(action, confidence, predictedPrice, seal),
    getLatestSignal: async () => parseStoredSignal(await contract.getFunction('getLatestSignal').staticCall()),
  }
}

export class SignalLedger {
  private contract: LedgerContract
  private timeoutMs: number

  constructor(contract: LedgerContract, timeoutMs = TX_TIMEOUT_MS) {
    this.contract = contract
    this.timeoutMs = timeoutMs
  }

  async publish(result: SignalResult, seal: BytesLike): Promise<{ txHash: string; blockNumber: number }> {
    const tx = await this.contract.setSignal(result.decision, result.confidence, result.forecastValue, hexlify(seal))
    getLogger().info({ event: 'signal.broadcast', tx_hash: tx.hash })
    const receipt = await tx.wait(1, this.timeoutMs)
    if (!receipt) throw new Error(`tx ${tx.hash} was not confirmed`)
    getLogger().info({ event: 'signal.published', tx_hash: tx.hash, block: receipt.blockNumber, ...signalFields(result) })
    return { txHash: tx.hash, blockNumber: receipt.blockNumber }
  }

  async latest(): Promise<StoredSignal> {
    const stored = await this.contract.getLatestSignal()
    getLogger().info({
      event: 'signal.latest',
      ...signalFields({ decision: stored.action, confidence: stored.confidence, forecastValue: stored.predictedPrice }),
      timestamp: stored.timestamp.toString(),
    })
    return stored
  }
}
