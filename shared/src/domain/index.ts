/**
 * Domain Layer
 *
 * Pure storage and picking logic. No file, network or clock access
 * except through injected parameters.
 */

export * from './components/index.js';
export * from './matching/index.js';
export * from './catalog/index.js';
export * from './allocation/index.js';
export * from './picking/index.js';
