// src/config.ts

/**
 * Centralized configuration module for environment variables and constants.
 */

// Load environment variables from .env.trend-signal file
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { isAddress } from 'ethers'
import { z } from 'zod'

// Package root for both ts-jest (src) and built (dist/src) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

export const CONSTANTS = {
  APP_NAME: 'trend-signal',
  ENV_FILE: '.env.trend-signal',
}

const candidateEnvPaths = [
  path.join(packageRoot, CONSTANTS.ENV_FILE),
  path.join(process.cwd(), CONSTANTS.ENV_FILE)
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v)

const amount = z.string().regex(/^\d+$/, 'expected a non-negative integer in the smallest unit').transform(v => BigInt(v))

export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Forecaster input: 3.7 ETH in wei unless overridden
  OBSERVED_AMOUNT: amount.default('3700000000000000000'),

  // Ledger publication is enabled only when all three are present
  RPC_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  PRIVATE_KEY: z.preprocess(blankToUndefined, z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, 'expected a 32-byte hex key').optional()),
  TRADING_SIGNAL_ADDRESS: z.preprocess(blankToUndefined, z.string().refine(v => isAddress(v), 'expected a 0x-prefixed address').optional()),

  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  REQUEST_TTL_MS: z.coerce.number().int().positive().default(600_000),
  MIN_FORECAST_VALUE: amount.default('100000000000000000'),
})

export type Env = z.infer<typeof EnvSchema>

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const res = EnvSchema.safeParse(source)
  if (!res.success) {
    const detail = res.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${detail}`)
  }
  return res.data
}

export const ENV = loadEnv()
