/**
 * @llhls-edge/server
 * Edge request handling, origin access and caching for LL-HLS delta updates
 */

export * from './app.js';
export * from './config.js';
export * from './cache/index.js';
export * from './origin/index.js';
export * from './server/index.js';
