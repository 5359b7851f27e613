/**
 * Components Domain
 *
 * Value codec, canonical identities and storage slot helpers.
 */

export * from './values.js';
export * from './identity.js';
