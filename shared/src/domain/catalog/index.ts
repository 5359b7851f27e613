/**
 * Catalog Domain
 *
 * Part classification and inventory/reference merging.
 */

export * from './classify.js';
export * from './merge.js';
export * from './reconcile.js';
