/**
 * Matching Domain
 *
 * Rule tables, label normalization, similarity scorers and the fuzzy matcher.
 */

export * from './rules.js';
export * from './normalize.js';
export * from './similarity.js';
export * from './fuzzyMatcher.js';
