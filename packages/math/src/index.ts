/**
 * trend-signal math public surface. Pure, side-effect free bigint helpers.
 */
export * from './regression'
export * from './forecast'
