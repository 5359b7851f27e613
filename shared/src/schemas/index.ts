/**
 * Shared Zod schemas for drawermap
 *
 * Everything read from disk or from the inventory system passes one of these.
 */

export * from './storage.js';
