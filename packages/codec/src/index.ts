/**
 * ResultCodec public surface: strict canonical codec plus tolerant recovery.
 */
export * from './abi'
export * from './plausibility'
export * from './recover'
