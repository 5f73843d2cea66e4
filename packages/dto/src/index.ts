/**
 * trend-signal DTO package public surface.
 * Re-exports the shared signal types and error codes. Only items exported here are published.
 */
export * from './enums';
export * from './reasons';
