/*
 * Application entry point for trend-signal.
 *
 *  1. Read configuration (.env.trend-signal + process env)
 *  2. Submit the observed amount to the proving market and wait for fulfillment
 *  3. Recover the signal tuple from the fulfillment envelope
 *  4. Publish it to the TradingSignal contract when RPC_URL, PRIVATE_KEY and TRADING_SIGNAL_ADDRESS are set
 */

import { JsonRpcProvider, Wallet } from 'ethers'
import { defaultRules } from '@trend-signal/codec'
import { CONSTANTS, ENV } from './config'
import { LocalProvingMarket } from './services/ProvingMarket'
import { SignalLedger, ethersLedger } from './services/SignalLedger'
import { runSignalRequest } from './services/SignalPipeline'
import { createLogger, getLogger, setLogger } from './utils/logger'

function buildLedger(): SignalLedger | undefined {
  if (!ENV.RPC_URL || !ENV.PRIVATE_KEY || !ENV.TRADING_SIGNAL_ADDRESS) return undefined
  const provider = new JsonRpcProvider(ENV.RPC_URL)
  const wallet = new Wallet(ENV.PRIVATE_KEY, provider)
  return new SignalLedger(ethersLedger(ENV.TRADING_SIGNAL_ADDRESS, wallet))
}

async function start(): Promise<void> {
  setLogger(createLogger(ENV.LOG_LEVEL))
  getLogger().info({ event: 'app.start', app: CONSTANTS.APP_NAME, node_env: ENV.NODE_ENV })
  const outcome = await runSignalRequest(ENV.OBSERVED_AMOUNT, {
    market: new LocalProvingMarket({ ttlMs: ENV.REQUEST_TTL_MS }),
    ledger: buildLedger(),
    pollIntervalMs: ENV.POLL_INTERVAL_MS,
    resolve: { recover: { rules: defaultRules(ENV.MIN_FORECAST_VALUE) } },
  })
  getLogger().info({ event: 'app.done', request_id: outcome.requestId, published: outcome.published !== undefined })
}

if (require.main === module) {
  start().catch((err: unknown) => {
    getLogger().error({ event: 'app.failed', err: err instanceof Error ? err.message : String(err) })
    process.exitCode = 1
  })
}
