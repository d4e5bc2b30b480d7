/**
 * Playlist request handling
 */

export * from './classifier.js';
export * from './handler.js';
export * from './middleware.js';
