/**
 * Picking Domain
 *
 * Pick sheet generation and its plain-text rendering.
 */

export * from './pickList.js';
export * from './report.js';
