/**
 * BOM Services
 */

export * from './bomReader.js';
