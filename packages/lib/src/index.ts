// packages/lib/src/index.ts
// Root entry: the engine, the codecs and the logger.
// Cloud SDK helpers are NOT exported here; import them via `@drawstats/lib/gcs`.
export * from './gameRegistry.js';
export * from './logger.js';
export * from './lotto/draws.js';
export * from './lotto/errors.js';
export * from './lotto/frequency.js';
export * from './lotto/optimizer.js';
export * from './lotto/paths.js';
export * from './lotto/significance.js';
export * from './lotto/stats.js';
export * from './lotto/validate.js';
export * from './validation/schemas.js';
export { GAME_TYPES, REGULAR_POSITIONS, ALL_POSITIONS, SPECIAL_POSITION } from './lotto/types.js';
export type * from './lotto/types.js';
