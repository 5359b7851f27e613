/**
 * Inventory Services
 *
 * Gateway interface to the inventory system and the retry wrapper for its calls.
 */

export * from './gateway.js';
export * from './retry.js';
