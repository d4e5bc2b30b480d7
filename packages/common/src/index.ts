/**
 * @llhls-edge/common
 * Shared types, constants, and utilities for the LL-HLS delta edge
 */

export * from './types.js';
export * from './constants.js';
export * from './errors.js';
export * from './utils/index.js';
