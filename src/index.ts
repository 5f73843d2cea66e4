export * from './services/ProvingMarket'
export * from './services/FulfillmentResolver'
export * from './services/SignalLedger'
export * from './services/SignalPipeline'
export { loadEnv, EnvSchema } from './config'
export type { Env } from './config'
export { setLogger, getLogger, signalFields } from './utils/logger'
