/**
 * torrent-forge plugin utilities
 * Shared logging, retry and validation helpers
 */

export * from './types.js';
export * from './logger.js';
export * from './retry.js';
export * from './validation.js';
