import pino from 'pino'
import { formatEther } from 'ethers'
import { Decision } from '@trend-signal/dto'
import type { SignalResult } from '@trend-signal/dto'

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): pino.BaseLogger {
  return pino({ level })
}

// create default logger; main swaps in the configured level, tests can replace via setLogger
let logger: pino.BaseLogger = createLogger()

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

export type SignalFields = {
  action: 'BUY' | 'SELL'
  confidence: string
  forecast_wei: string
  forecast_eth: string
}

// bigints go out as strings so log lines stay exact after JSON.parse
export function signalFields(result: SignalResult): SignalFields {
  return {
    action: result.decision === Decision.BUY ? 'BUY' : 'SELL',
    confidence: result.confidence.toString(),
    forecast_wei: result.forecastValue.toString(),
    forecast_eth: formatEther(result.forecastValue),
  }
}
