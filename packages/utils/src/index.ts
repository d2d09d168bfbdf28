/**
 * @pixhold/utils
 *
 * Shared utilities:
 * - logger (pino factory)
 * - response envelopes
 * - path helpers
 */

export * from './logger.js';
export * from './response.js';
export * from './path.js';
