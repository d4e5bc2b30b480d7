/**
 * @llhls-edge/playlist
 * Playlist model, parser, delta policy and renderer
 */

export * from './attributes.js';
export * from './tags.js';
export * from './model.js';
export * from './parser.js';
export * from './policy.js';
export * from './renderer.js';
export * from './transform.js';
