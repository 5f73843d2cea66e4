export * from './series'
export * from './forecaster'
