/**
 * Allocation Domain
 *
 * Topology, grouping rules, the allocation engine and label building.
 */

export * from './topology.js';
export * from './grouping.js';
export * from './allocate.js';
export * from './labels.js';
