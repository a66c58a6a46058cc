/**
 * @module @crew-control/contracts
 * Shared contracts for the crew-control packages.
 */

export * from './types.js';
export * from './config.js';
export * from './errors.js';
export * from './run-state.js';
export * from './runtime.js';
export type * from './oracle.js';
export type * from './tools.js';
export type * from './logger.js';
export { silentLogger } from './logger.js';
