export { REASONS } from '@trend-signal/dto'
export type { ReasonCode, ReasonDetail } from '@trend-signal/dto'
export * from './errors'
export * from './factory'
